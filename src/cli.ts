#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';

import { mapCopybookSources } from './core/mapCopybook';
import type { InputKind } from './core/mapCopybook';
import { isOutputFormat, renderModel } from './core/renderModel';
import type { OutputFormat } from './core/renderModel';
import { MapperError, NoInputError } from './errors';
import { writeReportFile } from './report/writeReport';
import { readInputs } from './scan/readInputs';
import { VERSION } from './version';

function parseBoolish(v: unknown, defaultValue: boolean): boolean {
  if (v === undefined || v === null) return defaultValue;
  if (typeof v === 'boolean') return v;
  const s = String(v).trim().toLowerCase();
  if (s === '') return true; // presence of option with no value
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
}

function isInputKind(v: string): v is InputKind {
  return v === 'copybook' || v === 'records';
}

export type MapOptions = {
  /** File paths or glob patterns; empty means stdin. */
  files: string[];
  format: OutputFormat;
  input: InputKind;
  /** Output file; stdout when absent. */
  out?: string;
  /** Report file (`.json` for JSON, Markdown otherwise). */
  report?: string;
  failOnUnresolved: boolean;
  verbose: boolean;
  /** Defaults to process.stdin. */
  stdin?: NodeJS.ReadableStream;
};

/**
 * Run one mapping. Returns the process exit code:
 * 0 success, 1 no input, 2 mapping failure, 3 unresolved names with failOnUnresolved.
 */
export async function runMap(opts: MapOptions): Promise<number> {
  let result: ReturnType<typeof mapCopybookSources>;
  try {
    const sources = await readInputs(opts.files, opts.stdin);
    // eslint-disable-next-line no-console
    console.error('*** Mapping...');
    result = mapCopybookSources(sources, {
      input: opts.input,
      trackUnresolved: Boolean(opts.report) || opts.failOnUnresolved,
    });
  } catch (e) {
    if (!(e instanceof MapperError)) throw e;
    // eslint-disable-next-line no-console
    console.error(`ERROR: ${e.message}`);
    return e instanceof NoInputError ? 1 : 2;
  }

  const output = renderModel(result.model, opts.format);
  if (opts.out) {
    await fs.mkdir(path.dirname(opts.out), { recursive: true });
    await fs.writeFile(opts.out, output, 'utf8');
  } else {
    process.stdout.write(output);
  }

  if (opts.report && result.report) await writeReportFile(opts.report, result.report);

  if (opts.verbose) {
    const relations = result.model.classes.reduce((n, c) => n + c.associations.length, 0);
    // eslint-disable-next-line no-console
    console.error(
      `Mapped ${result.model.classes.length} class(es), ${relations} association(s)` +
        (opts.out ? `. Wrote: ${opts.out}` : ''),
    );
    if (opts.report) {
      // eslint-disable-next-line no-console
      console.error(`Wrote report: ${opts.report} (unresolved: ${result.unresolvedCount})`);
    }
  }

  if (opts.failOnUnresolved && result.unresolvedCount > 0) return 3;
  return 0;
}

type RawCliOptions = {
  format?: string;
  input?: string;
  out?: string;
  report?: string;
  failOnUnresolved?: unknown;
  verbose?: boolean;
};

export async function main(argv: string[]): Promise<number> {
  const program = new Command();

  program
    .name('copybook-mapper')
    .description('Map COBOL copybook record layouts to a class model (text listing, Graphviz dot or IR JSON)')
    .version(VERSION)
    .argument('[files...]', 'Copybook files or glob patterns (default: read stdin)')
    .option('--format <format>', 'text|dot|json', 'text')
    .option('--input <kind>', 'copybook|records (JSON record stream)', 'copybook')
    .option('--out <file>', 'Output file (default stdout)', '')
    .option('--report <file>', 'Optional mapping report path (.json or Markdown)', '')
    .option('--fail-on-unresolved [bool]', 'Exit 3 if association targets or superclasses are unresolved (default false)', (v) => v, undefined)
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (files: string[], raw: RawCliOptions) => {
      const format = String(raw.format ?? 'text').toLowerCase();
      const input = String(raw.input ?? 'copybook').toLowerCase();
      if (!isOutputFormat(format)) {
        // eslint-disable-next-line no-console
        console.error(`Unknown --format: ${format} (expected text, dot or json)`);
        process.exitCode = 1;
        return;
      }
      if (!isInputKind(input)) {
        // eslint-disable-next-line no-console
        console.error(`Unknown --input: ${input} (expected copybook or records)`);
        process.exitCode = 1;
        return;
      }

      const out = raw.out && raw.out.trim() !== '' ? raw.out : undefined;
      const report = raw.report && raw.report.trim() !== '' ? raw.report : undefined;

      process.exitCode = await runMap({
        files,
        format,
        input,
        out,
        report,
        failOnUnresolved: parseBoolish(raw.failOnUnresolved, false),
        verbose: Boolean(raw.verbose),
      });
    });

  try {
    await program.parseAsync(argv);
    return Number(process.exitCode ?? 0);
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(e);
      process.exitCode = 2;
    },
  );
}
