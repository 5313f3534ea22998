import { stableStringify } from '../output/deterministicJson';
import type { RegistryStatistics } from '../registry/exportRegistry';
import type { RelationKind } from '../registry/relationIndex';

export type ReportSeverity = 'info' | 'warning' | 'error';

export type ReportLocation = {
  /** Relative file path (posix) within the source root. */
  file: string;
  /** Index of the entry within the file's `types` array, when the finding concerns one fact. */
  typeIndex?: number;
};

export type ReportFindingKind =
  | 'invalidFactFile'
  | 'duplicateType'
  | 'danglingSuperclass'
  | 'danglingInterface'
  | 'danglingMixin'
  | 'superclassCycle'
  | 'note';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  location?: ReportLocation;
  tags?: Record<string, string>;
};

export type IndexReport = {
  schema: 'index-report-v1';
  tool: { name: string; version: string };
  sourceRoot: string;
  startedAtIso: string;
  finishedAtIso: string;
  filesScanned: number;
  factsLoaded: number;
  statistics: RegistryStatistics;
  counts: {
    relationsByKind: Partial<Record<RelationKind, number>>;
  };
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  sourceRoot: string;
  startedAtIso?: string;
}): IndexReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'index-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    sourceRoot: args.sourceRoot,
    startedAtIso: now,
    finishedAtIso: now,
    filesScanned: 0,
    factsLoaded: 0,
    statistics: { totalTypes: 0, withSuperclass: 0, withInterfaces: 0, withMixins: 0, generic: 0 },
    counts: { relationsByKind: {} },
    findings: [],
  };
}

export function finalizeReport(report: IndexReport, finishedAtIso?: string): IndexReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

/** Findings that make `--fail-on-findings` exit non-zero. */
export function countProblemFindings(report: IndexReport): number {
  return report.findings.filter((f) => f.severity !== 'info').length;
}

export function serializeReport(report: IndexReport): string {
  // Keep it deterministic for tests and CI diffs.
  return stableStringify(report);
}
