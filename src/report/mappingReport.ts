import { stableStringify } from '../ir/deterministicJson';

export type ReportSeverity = 'info' | 'warning' | 'error';

export type ReportFindingKind = 'unresolvedAssociationTarget' | 'unresolvedSuperclass';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  /** Class the finding is about. */
  className?: string;
  tags?: Record<string, string>;
};

export type MappingReport = {
  schema: 'mapping-report-v1';
  tool: { name: string; version: string };
  /** Input names (files or `<stdin>`), in reading order. */
  inputs: string[];
  startedAtIso: string;
  finishedAtIso: string;
  recordsMapped: number;
  counts: {
    classes: number;
    properties: number;
    associations: number;
    generalizations: number;
  };
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  inputs: string[];
  startedAtIso?: string;
}): MappingReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'mapping-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    inputs: [...args.inputs],
    startedAtIso: now,
    finishedAtIso: now,
    recordsMapped: 0,
    counts: { classes: 0, properties: 0, associations: 0, generalizations: 0 },
    findings: [],
  };
}

export function finalizeReport(report: MappingReport, finishedAtIso?: string): MappingReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function serializeReport(report: MappingReport): string {
  // Keep it deterministic for tests and CI diffs.
  return stableStringify(report);
}

export function countUnresolved(report: MappingReport): number {
  return report.findings.filter((f) => f.kind.startsWith('unresolved')).length;
}
