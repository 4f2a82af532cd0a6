import { MappingReport, ReportFinding, countUnresolved } from './mappingReport';

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|');
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

export function reportToMarkdown(report: MappingReport): string {
  const lines: string[] = [];
  const byKind = countByKind(report.findings);

  lines.push(`# Mapping report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Inputs: ${report.inputs.length > 0 ? report.inputs.map((i) => `\`${i}\``).join(', ') : '(none)'}`);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Records mapped: **${report.recordsMapped}**`);
  lines.push(`- Findings: **${report.findings.length}** (unresolved: **${countUnresolved(report)}**)`);
  lines.push('');

  lines.push(`## Counts`);
  lines.push('');
  lines.push(`| Element | Count |`);
  lines.push(`|---|---:|`);
  lines.push(`| classes | ${report.counts.classes} |`);
  lines.push(`| properties | ${report.counts.properties} |`);
  lines.push(`| associations | ${report.counts.associations} |`);
  lines.push(`| generalizations | ${report.counts.generalizations} |`);
  lines.push('');

  lines.push(`## Findings summary`);
  lines.push('');
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const fk = Object.keys(byKind).sort((a, b) => a.localeCompare(b));
  for (const k of fk) lines.push(`| ${k} | ${byKind[k]} |`);
  if (fk.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Class | Message |`);
  lines.push(`|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => {
    const ak = a.kind.localeCompare(b.kind);
    if (ak !== 0) return ak;
    const ac = (a.className ?? '').localeCompare(b.className ?? '');
    if (ac !== 0) return ac;
    return a.message.localeCompare(b.message);
  });
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${f.className ?? ''} | ${escapeCell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
