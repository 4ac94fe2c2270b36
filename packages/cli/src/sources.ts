// ============================================================================
// @treekey/cli — Named Sources
// ============================================================================
//
// Loads XML documents and suite definitions from the filesystem. Any failure
// here is fatal for the command that asked for the source.
// ============================================================================

import { readFileSync } from 'node:fs';
import path from 'node:path';
import {
  SourceLoadError,
  SuiteDefinitionError,
  type XmlDocumentView,
  parseXmlDocument,
} from '@treekey/core';
import { z } from 'zod';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Read and parse one XML file.
 *
 * @throws SourceLoadError when the file cannot be read
 * @throws XmlParseError when its content is not well-formed
 */
export function loadXmlSource(filePath: string): XmlDocumentView {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (e) {
    throw new SourceLoadError(filePath, errorMessage(e));
  }
  return parseXmlDocument(text, filePath);
}

// ---------------------------------------------------------------------------
// Suite definitions
// ---------------------------------------------------------------------------

const suiteSchema = z.object({
  dataDir: z.string().min(1).optional(),
  cases: z
    .array(
      z.object({
        lhs: z.string().min(1),
        rhs: z.string().min(1),
        equivalent: z.boolean(),
      }),
    )
    .min(1),
});

export type SuiteCase = z.infer<typeof suiteSchema>['cases'][number];

export interface Suite {
  /** Absolute directory the case file names resolve against. */
  dataDir: string;
  cases: SuiteCase[];
}

export const DEFAULT_DATA_DIR = 'test_data';

/**
 * Load a suite definition. `dataDir` resolves relative to the suite file and
 * defaults to `test_data` beside it; `dataDirOverride` resolves relative to
 * the working directory and wins over both.
 *
 * @throws SuiteDefinitionError when the file is unreadable or malformed
 */
export function loadSuite(suitePath: string, dataDirOverride?: string): Suite {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(suitePath, 'utf-8'));
  } catch (e) {
    throw new SuiteDefinitionError(suitePath, errorMessage(e));
  }

  const result = suiteSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new SuiteDefinitionError(suitePath, `${where}${issue?.message ?? 'invalid suite'}`);
  }

  const dataDir = dataDirOverride
    ? path.resolve(dataDirOverride)
    : path.resolve(path.dirname(suitePath), result.data.dataDir ?? DEFAULT_DATA_DIR);

  return { dataDir, cases: result.data.cases };
}
