import type { IndexReport, ReportFinding } from './indexReport';

export function addFinding(report: IndexReport, finding: ReportFinding): void {
  report.findings.push(finding);
}

export function incCount<K extends string>(map: Partial<Record<K, number>>, key: K, amount = 1): void {
  map[key] = (map[key] ?? 0) + amount;
}
