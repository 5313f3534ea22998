import fg from 'fast-glob';
import path from 'node:path';

import { toPosixPath } from '../util/path';

export type SourceScanOptions = {
  sourceRoot: string;
  /** Include globs (relative to sourceRoot); defaults to TypeScript sources. */
  includeGlobs?: string[];
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
  /** When false, common test locations/patterns are excluded. */
  includeTests?: boolean;
  /** Optional safety cap; if set, results are truncated deterministically after sorting. */
  maxFiles?: number;
};

const DEFAULT_EXCLUDES = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/.cache/**',
  '**/coverage/**',
  '**/.git/**',
  '**/out/**',
  '**/*.d.ts',
];

const DEFAULT_TEST_EXCLUDES = [
  '**/__tests__/**',
  '**/*.test.*',
  '**/*.spec.*',
  '**/test/**',
  '**/tests/**',
];

export const TS_SOURCE_INCLUDES = ['**/*.ts', '**/*.tsx', '**/*.mts', '**/*.cts'];

export const FACT_FILE_INCLUDES = ['**/*.facts.json'];

/**
 * Deterministically discovers files in a project.
 * Returns a stable, sorted list of relative paths (posix-style) from sourceRoot.
 */
export async function scanSourceFiles(opts: SourceScanOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const exclude = [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])];
  if (!opts.includeTests) exclude.push(...DEFAULT_TEST_EXCLUDES);

  const includes = opts.includeGlobs && opts.includeGlobs.length > 0 ? opts.includeGlobs : TS_SOURCE_INCLUDES;
  const matches = await fg(includes, {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: true,
    followSymbolicLinks: false,
    ignore: exclude,
  });

  // fast-glob usually returns posix paths even on Windows, but normalize anyway
  const rel = matches.map(toPosixPath);

  rel.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  if (opts.maxFiles && opts.maxFiles > 0 && rel.length > opts.maxFiles) {
    return rel.slice(0, opts.maxFiles);
  }
  return rel;
}
