import { IndexReport, ReportFinding } from './indexReport';

const DANGLING_KINDS = ['danglingSuperclass', 'danglingInterface', 'danglingMixin'] as const;

function fmtLoc(f: ReportFinding): string {
  if (!f.location) return '';
  const { file, typeIndex } = f.location;
  return typeIndex !== undefined ? `${file}#types[${typeIndex}]` : file;
}

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|');
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

/** Most referenced missing names for one dangling kind, by count then name. */
function topTargets(findings: ReportFinding[], kind: string, limit = 20): Array<{ target: string; count: number }> {
  const m = new Map<string, number>();
  for (const f of findings) {
    if (f.kind !== kind) continue;
    const target = f.tags?.target ?? f.message;
    m.set(target, (m.get(target) ?? 0) + 1);
  }
  const arr = Array.from(m.entries()).map(([target, count]) => ({ target, count }));
  arr.sort((a, b) => (b.count - a.count) || a.target.localeCompare(b.target));
  return arr.slice(0, limit);
}

function pushCountTable(lines: string[], rows: Record<string, number | undefined>): void {
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const keys = Object.keys(rows).sort((a, b) => a.localeCompare(b));
  for (const k of keys) lines.push(`| ${k} | ${rows[k] ?? 0} |`);
  if (keys.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');
}

export function reportToMarkdown(report: IndexReport): string {
  const lines: string[] = [];
  const dangling = report.findings.filter((f) => f.kind.startsWith('dangling'));
  const s = report.statistics;

  lines.push(`# Type index report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Source root: \`${report.sourceRoot}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Files scanned: **${report.filesScanned}**`);
  lines.push(`- Facts loaded: **${report.factsLoaded}**`);
  lines.push(`- Findings: **${report.findings.length}** (dangling: **${dangling.length}**)`);
  lines.push('');

  lines.push(`## Statistics`);
  lines.push('');
  lines.push(`| Statistic | Count |`);
  lines.push(`|---|---:|`);
  lines.push(`| totalTypes | ${s.totalTypes} |`);
  lines.push(`| withSuperclass | ${s.withSuperclass} |`);
  lines.push(`| withInterfaces | ${s.withInterfaces} |`);
  lines.push(`| withMixins | ${s.withMixins} |`);
  lines.push(`| generic | ${s.generic} |`);
  lines.push('');

  lines.push(`### Relations by kind`);
  lines.push('');
  pushCountTable(lines, report.counts.relationsByKind);

  lines.push(`## Findings summary`);
  lines.push('');
  pushCountTable(lines, countByKind(report.findings));

  if (dangling.length > 0) {
    lines.push(`## Top dangling references`);
    lines.push('');
    for (const kind of DANGLING_KINDS) {
      const top = topTargets(dangling, kind, 20);
      if (top.length === 0) continue;
      lines.push(`### ${kind}`);
      lines.push('');
      lines.push(`| Count | Target |`);
      lines.push(`|---:|---|`);
      for (const t of top) lines.push(`| ${t.count} | ${escapeCell(t.target)} |`);
      lines.push('');
    }
  }

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Location | Message |`);
  lines.push(`|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => {
    const ak = a.kind.localeCompare(b.kind);
    if (ak !== 0) return ak;
    const al = fmtLoc(a).localeCompare(fmtLoc(b));
    if (al !== 0) return al;
    return a.message.localeCompare(b.message);
  });
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${fmtLoc(f)} | ${escapeCell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
