// ============================================================================
// @treekey/cli — Commands
// ============================================================================
//
// Every command takes the raw argv (command first), writes through an Output
// and returns the process exit code:
//
//   0  equivalent / all cases passed
//   1  different / some case failed
//   2  usage, configuration or input error
// ============================================================================

import path from 'node:path';
import {
  DocumentMatcher,
  type MatchOptions,
  SourceLoadError,
  TreekeyError,
  XmlParseError,
  formatKey,
  resolveMatcherConfig,
  toMatchOptions,
} from '@treekey/core';
import { loadSuite, loadXmlSource } from './sources.js';

export const EXIT_OK = 0;
export const EXIT_MISMATCH = 1;
export const EXIT_ERROR = 2;

/** Depth bound applied when neither a flag nor the environment sets one. */
export const CLI_DEFAULT_MAX_DEPTH = 1000;

export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export interface CliContext {
  out: Output;
  env: NodeJS.ProcessEnv;
  /** Whether stdout is a terminal (used for color auto-detection). */
  isTTY: boolean;
}

// Flags that consume the following argument
const VALUE_FLAGS = new Set(['key-width', 'hash', 'max-depth', 'data-dir']);

function getFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

function positionals(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (VALUE_FLAGS.has(arg.slice(2))) i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}

// ── ANSI Color Helpers ──────────────────────────────────────────────────────

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  brightGreen: '\x1b[92m',
};

function supportsColor(args: string[], ctx: CliContext): boolean {
  if (hasFlag(args, 'no-color') || ctx.env.NO_COLOR === '1') return false;
  if (hasFlag(args, 'color')) return true;
  if (ctx.env.FORCE_COLOR === '1') return true;
  return ctx.isTTY;
}

function painter(useColor: boolean) {
  const clr = (color: string, text: string): string => (useColor ? `${color}${text}${ANSI.reset}` : text);
  return {
    pass: (text: string) => clr(ANSI.brightGreen, text),
    fail: (text: string) => clr(ANSI.red, text),
    heading: (text: string) => clr(ANSI.bold, text),
    dim: (text: string) => clr(ANSI.dim, text),
  };
}

function matchOptionsFrom(args: string[], ctx: CliContext): MatchOptions {
  const config = resolveMatcherConfig(ctx.env, {
    keyWidth: getFlag(args, 'key-width'),
    hasher: getFlag(args, 'hash'),
    maxDepth: getFlag(args, 'max-depth'),
    confirm: hasFlag(args, 'confirm') ? 'true' : undefined,
  });
  return toMatchOptions({ ...config, maxDepth: config.maxDepth ?? CLI_DEFAULT_MAX_DEPTH });
}

// ============================================================================
// match
// ============================================================================
export function matchCommand(args: string[], ctx: CliContext): number {
  const [lhsPath, rhsPath] = positionals(args.slice(1));
  if (!lhsPath || !rhsPath) {
    ctx.out.error('Error: match needs two input files');
    return EXIT_ERROR;
  }

  const matcher = new DocumentMatcher(matchOptionsFrom(args, ctx));
  const result = matcher.match(loadXmlSource(lhsPath), loadXmlSource(rhsPath));

  if (hasFlag(args, 'json')) {
    ctx.out.log(
      JSON.stringify(
        {
          lhs: lhsPath,
          rhs: rhsPath,
          equivalent: result.equivalent,
          confirmed: result.confirmed,
          keyWidth: result.keyWidth,
          lhsKey: formatKey(result.lhsKey, result.keyWidth),
          rhsKey: formatKey(result.rhsKey, result.keyWidth),
        },
        null,
        2,
      ),
    );
  } else {
    const ui = painter(supportsColor(args, ctx));
    ctx.out.log(result.equivalent ? ui.pass('equivalent') : ui.fail('different'));
  }

  return result.equivalent ? EXIT_OK : EXIT_MISMATCH;
}

// ============================================================================
// key
// ============================================================================
export function keyCommand(args: string[], ctx: CliContext): number {
  const files = positionals(args.slice(1));
  if (files.length === 0) {
    ctx.out.error('Error: missing input file');
    return EXIT_ERROR;
  }

  const matcher = new DocumentMatcher(matchOptionsFrom(args, ctx));
  for (const file of files) {
    const key = matcher.documentKey(loadXmlSource(file));
    ctx.out.log(`${formatKey(key, matcher.computer.keyWidth)}  ${file}`);
  }
  return EXIT_OK;
}

// ============================================================================
// suite
// ============================================================================
export function suiteCommand(args: string[], ctx: CliContext): number {
  const [suitePath] = positionals(args.slice(1));
  if (!suitePath) {
    ctx.out.error('Error: missing suite file');
    return EXIT_ERROR;
  }

  const suite = loadSuite(suitePath, getFlag(args, 'data-dir'));
  const matcher = new DocumentMatcher(matchOptionsFrom(args, ctx));
  const ui = painter(supportsColor(args, ctx));

  let passed = 0;
  let failed = 0;
  for (const testCase of suite.cases) {
    const lhs = loadXmlSource(path.join(suite.dataDir, testCase.lhs));
    const rhs = loadXmlSource(path.join(suite.dataDir, testCase.rhs));
    const ok = matcher.matchLoosely(lhs, rhs) === testCase.equivalent;
    if (ok) passed++;
    else failed++;

    const relation = testCase.equivalent ? '==' : '!=';
    const verdict = ok ? ui.pass('PASSED') : ui.fail('FAILED');
    ctx.out.log(`[${testCase.lhs}] ${relation} [${testCase.rhs}] ---> ${verdict}`);
  }

  ctx.out.log(ui.dim(`${passed} passed, ${failed} failed`));
  return failed === 0 ? EXIT_OK : EXIT_MISMATCH;
}

// ============================================================================
// usage
// ============================================================================
export function printUsage(ctx: CliContext): void {
  const ui = painter(false);
  ctx.out.log(`
  ${ui.heading('treekey')} - order-insensitive structural matching for XML

  Usage:
    treekey match <lhs.xml> <rhs.xml> [--json]   Compare two documents
    treekey key   <file.xml> [more.xml ...]      Print document keys
    treekey suite <cases.json> [--data-dir DIR]  Run expected-verdict case pairs

  Matching Options:
    --key-width 32|64|128   Key width in bits (TREEKEY_KEY_WIDTH, default 64)
    --hash sha256|fnv1a     Text hash (TREEKEY_HASH, default sha256)
    --max-depth N           Reject deeper trees (TREEKEY_MAX_DEPTH, default ${CLI_DEFAULT_MAX_DEPTH})
    --confirm               Confirm key matches structurally (TREEKEY_CONFIRM)

  Display Options:
    --color / --no-color    Force colored output on or off (FORCE_COLOR=1, NO_COLOR=1)

  Environment Variables:
    TREEKEY_DEBUG=1         Debug logging (key timings)
  `);
}

/**
 * Dispatch a command. Input and configuration errors become messages and
 * exit code 2; anything else propagates.
 */
export function runCli(args: string[], ctx: CliContext): number {
  try {
    switch (args[0]) {
      case 'match':
        return matchCommand(args, ctx);
      case 'key':
        return keyCommand(args, ctx);
      case 'suite':
        return suiteCommand(args, ctx);
      default:
        printUsage(ctx);
        return EXIT_OK;
    }
  } catch (e) {
    if (e instanceof SourceLoadError) {
      ctx.out.error(`Failed to load XML file \`${e.source}\`: \`${e.reason}\``);
      return EXIT_ERROR;
    }
    if (e instanceof XmlParseError) {
      ctx.out.error(`Failed to load XML file \`${e.source ?? '<input>'}\`: \`${e.reason}\``);
      return EXIT_ERROR;
    }
    if (e instanceof TreekeyError) {
      ctx.out.error(`Error: ${e.message}`);
      return EXIT_ERROR;
    }
    throw e;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Process entry: like `runCli`, but an unexpected failure is reported on
 * stderr and exits with `EXIT_ERROR` instead of escaping.
 */
export function runMain(args: string[], ctx: CliContext): number {
  try {
    return runCli(args, ctx);
  } catch (error: unknown) {
    ctx.out.error(`Error: ${errorMessage(error)}`);
    return EXIT_ERROR;
  }
}
