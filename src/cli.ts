#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { VERSION } from './index';
import { parseBoolish, parseIntish, optionalString, stringList } from './cli/args';
import { executeQuery } from './cli/query';
import { extractTypeFacts } from './extract/ts/tsFactExtractor';
import { typeFactToJson } from './facts/typeFact';
import { loadFactFiles } from './facts/loadFactFiles';
import { writeFactDocumentFile, writeIndexJsonFile } from './output/writeIndexJson';
import { TypeRegistry } from './registry/typeRegistry';
import { collectRegistryFindings, summarizeRegistry } from './report/diagnostics';
import { countProblemFindings, createEmptyReport, finalizeReport } from './report/indexReport';
import { reportFormatForPath, writeReportFile } from './report/writeReport';

export const TOOL_NAME = 'type-relation-index';

export type IndexCommandOptions = {
  source: string;
  out: string;
  pattern: string[];
  exclude: string[];
  maxFiles?: number;
  hierarchy: string[];
  report?: string;
  failOnFindings: boolean;
  verbose: boolean;
};

export type ExtractCommandOptions = {
  source: string;
  out: string;
  tsconfig?: string;
  exclude: string[];
  includeTests: boolean;
  maxFiles?: number;
  bases: string[];
  report?: string;
  verbose: boolean;
};

export type QueryCommandOptions = {
  source: string;
  pattern: string[];
  exclude: string[];
  operation: string;
  args: string[];
};

/**
 * Load fact documents, index them and write the export. Exit code 3 when
 * `failOnFindings` is set and warnings or errors were found.
 */
export async function runIndex(opts: IndexCommandOptions): Promise<number> {
  const report = createEmptyReport({ toolName: TOOL_NAME, toolVersion: VERSION, sourceRoot: opts.source });

  const loaded = await loadFactFiles({
    sourceRoot: opts.source,
    includeGlobs: opts.pattern,
    excludeGlobs: opts.exclude,
    maxFiles: opts.maxFiles,
    report,
  });

  const registry = new TypeRegistry();
  registry.registerAll(loaded.facts);

  summarizeRegistry(registry, report);
  collectRegistryFindings(registry, report);
  finalizeReport(report);

  await writeIndexJsonFile(opts.out, registry.export());

  for (const root of opts.hierarchy) {
    const tree = registry.renderHierarchy(root);
    if (tree === '') continue;
    // eslint-disable-next-line no-console
    console.log(tree.replace(/\n$/, ''));
  }

  if (opts.report) await writeReportFile(opts.report, report, reportFormatForPath(opts.report));

  const problems = countProblemFindings(report);
  if (opts.verbose) {
    // eslint-disable-next-line no-console
    console.log(
      `Indexed ${registry.length} type(s) from ${loaded.files.length} fact file(s). Wrote: ${opts.out}` +
        ` (findings: ${problems})`,
    );
    if (opts.report) {
      // eslint-disable-next-line no-console
      console.log(`Wrote report: ${opts.report}`);
    }
  }

  if (opts.failOnFindings && problems > 0) return 3;
  return 0;
}

/** Extract facts from TypeScript sources and write them as a fact document. */
export async function runExtract(opts: ExtractCommandOptions): Promise<number> {
  const report = createEmptyReport({ toolName: TOOL_NAME, toolVersion: VERSION, sourceRoot: opts.source });

  const facts = await extractTypeFacts({
    projectRoot: opts.source,
    tsconfigPath: opts.tsconfig,
    excludeGlobs: opts.exclude,
    includeTests: opts.includeTests,
    maxFiles: opts.maxFiles,
    bases: opts.bases,
    report,
  });

  await writeFactDocumentFile(opts.out, facts.map(typeFactToJson));

  if (opts.report) {
    const registry = new TypeRegistry();
    registry.registerAll(facts);
    summarizeRegistry(registry, report);
    collectRegistryFindings(registry, report);
    await writeReportFile(opts.report, finalizeReport(report), reportFormatForPath(opts.report));
  }

  if (opts.verbose) {
    // eslint-disable-next-line no-console
    console.log(`Extracted ${facts.length} type fact(s) from ${report.filesScanned} file(s). Wrote: ${opts.out}`);
  }
  return 0;
}

/** Load fact documents and print one query result, one line per entry. Exit code 1 on bad usage. */
export async function runQuery(opts: QueryCommandOptions): Promise<number> {
  const loaded = await loadFactFiles({ sourceRoot: opts.source, includeGlobs: opts.pattern, excludeGlobs: opts.exclude });
  const registry = new TypeRegistry();
  registry.registerAll(loaded.facts);

  const result = executeQuery(registry, opts.operation, opts.args);
  if (!result.ok) {
    // eslint-disable-next-line no-console
    console.error(result.error);
    return 1;
  }
  for (const line of result.lines) {
    // eslint-disable-next-line no-console
    console.log(line);
  }
  return 0;
}

type RawOptions = Record<string, unknown>;

function requireString(raw: RawOptions, key: string): string {
  const v = optionalString(raw[key]);
  if (v === undefined) throw new Error(`Missing required option: --${key}`);
  return v;
}

export async function main(argv: string[]): Promise<number> {
  const program = new Command();
  let exitCode = 0;

  program
    .name(TOOL_NAME)
    .description('Index type relations (superclass, interfaces, mixins, generic bindings) for code generators')
    .version(VERSION)
    // Throw instead of exiting so usage errors map to exit codes below.
    .exitOverride();

  program
    .command('index')
    .description('Load fact documents, index them and write the registry export as deterministic JSON.')
    .requiredOption('--source <path>', 'Root directory containing fact documents')
    .requiredOption('--out <file>', 'Output JSON file path')
    .option('--pattern <glob...>', 'Fact document globs (default **/*.facts.json)', [])
    .option('--exclude <glob...>', 'Repeatable exclude globs (relative to --source)', [])
    .option('--max-files <n>', 'Safety cap (default no cap)', (v) => v, undefined)
    .option('--hierarchy <root...>', 'Print the superclass hierarchy below each root', [])
    .option('--report <file>', 'Optional report path (.json for JSON, otherwise Markdown)', '')
    .option('--fail-on-findings [bool]', 'Exit 3 when warnings or errors were found (default false)', (v) => v, undefined)
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: RawOptions) => {
      exitCode = await runIndex({
        source: requireString(raw, 'source'),
        out: requireString(raw, 'out'),
        pattern: stringList(raw.pattern),
        exclude: stringList(raw.exclude),
        maxFiles: parseIntish(raw.maxFiles),
        hierarchy: stringList(raw.hierarchy),
        report: optionalString(raw.report),
        failOnFindings: parseBoolish(raw.failOnFindings, false),
        verbose: Boolean(raw.verbose),
      });
    });

  program
    .command('extract')
    .description('Extract type facts from TypeScript sources and write a fact document.')
    .requiredOption('--source <path>', 'Root directory to analyze')
    .requiredOption('--out <file>', 'Output fact document path')
    .option('--tsconfig <path>', 'Explicit tsconfig.json selection (overrides auto)', '')
    .option('--exclude <glob...>', 'Repeatable exclude globs (relative to --source)', [])
    .option('--include-tests [bool]', 'Include tests (default false)', (v) => v, undefined)
    .option('--max-files <n>', 'Safety cap (default no cap)', (v) => v, undefined)
    .option('--base <name...>', 'Keep only descendants of these base types', [])
    .option('--report <file>', 'Optional report path (.json for JSON, otherwise Markdown)', '')
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: RawOptions) => {
      exitCode = await runExtract({
        source: requireString(raw, 'source'),
        out: requireString(raw, 'out'),
        tsconfig: optionalString(raw.tsconfig),
        exclude: stringList(raw.exclude),
        includeTests: parseBoolish(raw.includeTests, false),
        maxFiles: parseIntish(raw.maxFiles),
        bases: stringList(raw.base),
        report: optionalString(raw.report),
        verbose: Boolean(raw.verbose),
      });
    });

  program
    .command('query')
    .description('Run one registry query over fact documents and print the result.')
    .argument('<operation>', 'show|subclasses|implementers|mixin|any-base|descendants|generic|generic-arg|tree|type-map')
    .argument('[names...]', 'Operation arguments')
    .requiredOption('--source <path>', 'Root directory containing fact documents')
    .option('--pattern <glob...>', 'Fact document globs (default **/*.facts.json)', [])
    .option('--exclude <glob...>', 'Repeatable exclude globs (relative to --source)', [])
    .action(async (operation: string, names: string[], raw: RawOptions) => {
      exitCode = await runQuery({
        source: requireString(raw, 'source'),
        pattern: stringList(raw.pattern),
        exclude: stringList(raw.exclude),
        operation,
        args: names,
      });
    });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e: unknown) {
    // Commander has already printed usage problems (and --help / --version output).
    if (e instanceof CommanderError) return e.exitCode === 0 ? 0 : 1;
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(e);
      process.exitCode = 2;
    });
}
