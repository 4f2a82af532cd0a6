import fs from 'node:fs/promises';

import type { InputSource } from '../core/mapCopybook';
import { NoInputError } from '../errors';
import { resolveInputFiles } from './sourceScanner';

export const STDIN_NAME = '<stdin>';

export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Read the named files (or, when none is readable, the whole of stdin).
 * Progress goes to stderr; throws NoInputError when nothing was read.
 */
export async function readInputs(args: string[], stdin: NodeJS.ReadableStream = process.stdin): Promise<InputSource[]> {
  const sources: InputSource[] = [];

  if (args.length > 0) {
    const { files, unknown } = await resolveInputFiles(args);
    for (const arg of unknown) {
      // eslint-disable-next-line no-console
      console.error(`WARNING: Unknown file: ${arg}`);
    }
    for (const file of files) {
      // eslint-disable-next-line no-console
      console.error(`*** Importing ${file}`);
      sources.push({ name: file, text: await fs.readFile(file, 'utf8') });
    }
  }

  if (sources.length === 0) {
    // eslint-disable-next-line no-console
    console.error('*** Reading from stdin...');
    const text = await readStream(stdin);
    if (text.trim() !== '') sources.push({ name: STDIN_NAME, text });
  }

  if (sources.length === 0) throw new NoInputError();
  return sources;
}
