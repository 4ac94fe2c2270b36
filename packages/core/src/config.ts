// ============================================================================
// @treekey/core — Matcher Configuration
// ============================================================================
//
// Settings come from the environment and may be overridden explicitly
// (e.g. by CLI flags). Overrides win. All raw values are strings.
//
//   TREEKEY_KEY_WIDTH   32 | 64 | 128          (default 64)
//   TREEKEY_HASH        sha256 | fnv1a         (default sha256)
//   TREEKEY_MAX_DEPTH   positive integer       (default unbounded)
//   TREEKEY_CONFIRM     1 | true | 0 | false   (default false)
// ============================================================================

import process from 'node:process';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_KEY_WIDTH, type KeyWidth } from './keys.js';
import type { MatchOptions } from './matcher.js';
import { DEFAULT_TEXT_HASHER, type TextHasherName, resolveTextHasher } from './text_hash.js';

export interface MatcherConfig {
  keyWidth: KeyWidth;
  hasher: TextHasherName;
  maxDepth?: number;
  confirm: boolean;
}

export type ConfigKey = keyof MatcherConfig;

export type RawConfig = Partial<Record<ConfigKey, string>>;

const CONFIG_KEYS: readonly ConfigKey[] = ['keyWidth', 'hasher', 'maxDepth', 'confirm'];

export const CONFIG_ENV_VARS: Record<ConfigKey, string> = {
  keyWidth: 'TREEKEY_KEY_WIDTH',
  hasher: 'TREEKEY_HASH',
  maxDepth: 'TREEKEY_MAX_DEPTH',
  confirm: 'TREEKEY_CONFIRM',
};

const KEY_WIDTH_BY_NAME = { '32': 32, '64': 64, '128': 128 } as const satisfies Record<string, KeyWidth>;

const configSchema = z.object({
  keyWidth: z
    .enum(['32', '64', '128'])
    .transform((w): KeyWidth => KEY_WIDTH_BY_NAME[w])
    .optional(),
  hasher: z.enum(['sha256', 'fnv1a']).optional(),
  maxDepth: z
    .string()
    .regex(/^[1-9]\d*$/, 'expected a positive integer')
    .transform(Number)
    .optional(),
  confirm: z
    .enum(['1', 'true', '0', 'false'])
    .transform((v) => v === '1' || v === 'true')
    .optional(),
});

function readEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  for (const key of CONFIG_KEYS) {
    const value = env[CONFIG_ENV_VARS[key]];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }
  return raw;
}

/**
 * Resolve the matcher configuration from the environment and overrides.
 *
 * @throws ConfigError naming the first invalid setting
 */
export function resolveMatcherConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RawConfig = {},
): MatcherConfig {
  const raw: RawConfig = { ...readEnv(env) };
  for (const key of CONFIG_KEYS) {
    const value = overrides[key];
    if (value !== undefined) raw[key] = value;
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(String(issue?.path[0] ?? 'config'), issue?.message ?? 'invalid value');
  }

  const { keyWidth, hasher, maxDepth, confirm } = result.data;
  return {
    keyWidth: keyWidth ?? DEFAULT_KEY_WIDTH,
    hasher: hasher ?? DEFAULT_TEXT_HASHER,
    maxDepth,
    confirm: confirm ?? false,
  };
}

export function toMatchOptions(config: MatcherConfig): MatchOptions {
  return {
    keyWidth: config.keyWidth,
    hashText: resolveTextHasher(config.hasher),
    maxDepth: config.maxDepth,
    confirm: config.confirm,
  };
}
