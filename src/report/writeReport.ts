import fs from 'node:fs/promises';
import path from 'node:path';
import { IndexReport, serializeReport } from './indexReport';
import { reportToMarkdown } from './markdownReport';

export type ReportFormat = 'json' | 'md';

/** `.json` files get JSON, anything else Markdown. */
export function reportFormatForPath(outFile: string): ReportFormat {
  return path.extname(outFile).toLowerCase() === '.json' ? 'json' : 'md';
}

export async function writeReportFile(outFile: string, report: IndexReport, format: ReportFormat = 'md'): Promise<void> {
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  const content = format === 'json' ? serializeReport(report) : reportToMarkdown(report);
  await fs.writeFile(outFile, content, 'utf8');
}
