import type { CopybookRecord } from '../copybook/ast';
import { loadRecordsJson } from '../copybook/loadRecordsJson';
import { parseCopybook } from '../copybook/parser';
import { mapRecords } from '../map/mapRecords';
import type { Model } from '../model/model';
import { countUnresolved, createEmptyReport, finalizeReport } from '../report/mappingReport';
import type { MappingReport } from '../report/mappingReport';
import { collectModelFindings } from '../report/reportBuilder';
import { VERSION } from '../version';

export type InputKind = 'copybook' | 'records';

export type InputSource = {
  /** File path or `<stdin>`. */
  name: string;
  text: string;
};

export type MapCopybookOptions = {
  /** How to read the sources (default `copybook`). */
  input?: InputKind;
  /**
   * If true, a report (counts + unresolved names) is built in memory.
   */
  trackUnresolved?: boolean;
};

export type MapCopybookResult = {
  model: Model;
  report?: MappingReport;
  unresolvedCount: number;
};

/**
 * Read the sources, in order, into one record stream.
 * Each source is parsed on its own so errors point at the right file and line.
 */
export function readRecords(sources: InputSource[], input: InputKind = 'copybook'): CopybookRecord[] {
  if (input === 'records') return sources.flatMap((s) => loadRecordsJson(s.text, s.name));
  return sources.flatMap((s) => parseCopybook(s.text, { source: s.name }));
}

/**
 * Core library entrypoint: map copybook sources to a model.
 *
 * - Does not write files.
 * - Returns the model and (optionally) a finalized report.
 */
export function mapCopybookSources(sources: InputSource[], opts: MapCopybookOptions = {}): MapCopybookResult {
  const report = opts.trackUnresolved
    ? createEmptyReport({ toolName: 'copybook-mapper', toolVersion: VERSION, inputs: sources.map((s) => s.name) })
    : undefined;

  const records = readRecords(sources, opts.input);
  const model = mapRecords(records);

  if (!report) return { model, unresolvedCount: 0 };

  report.recordsMapped = records.length;
  collectModelFindings(report, model);
  const finalReport = finalizeReport(report);
  return { model, report: finalReport, unresolvedCount: countUnresolved(finalReport) };
}
