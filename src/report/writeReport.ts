import fs from 'node:fs/promises';
import path from 'node:path';
import { MappingReport, serializeReport } from './mappingReport';
import { reportToMarkdown } from './markdownReport';

export type ReportFormat = 'json' | 'md';

export function reportFormatForPath(outFile: string): ReportFormat {
  return path.extname(outFile).toLowerCase() === '.json' ? 'json' : 'md';
}

export async function writeReportFile(
  outFile: string,
  report: MappingReport,
  format: ReportFormat = reportFormatForPath(outFile),
): Promise<void> {
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  const content = format === 'json' ? serializeReport(report) : reportToMarkdown(report);
  await fs.writeFile(outFile, content, 'utf8');
}
