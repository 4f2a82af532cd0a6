import Ajv from 'ajv/dist/2020';

import { MalformedInputError } from '../errors';
import type { CopybookRecord } from './ast';
import recordsSchema from './schema/records-schema.json';

const ajv = new Ajv({ allErrors: true, strict: false });
// Kind tags are checked as plain strings: unknown tags are left for the importer to reject.
const validateRecords = ajv.compile<CopybookRecord[]>(recordsSchema);

/**
 * Load an already-parsed record stream (JSON array of records).
 */
export function loadRecordsJson(text: string, source?: string): CopybookRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new MalformedInputError(`Invalid JSON record stream: ${msg}`, { source });
  }

  if (!validateRecords(parsed)) {
    const details = (validateRecords.errors ?? [])
      .map((err) => `${err.instancePath || '/'} ${err.message ?? 'is invalid'}`)
      .join('; ');
    throw new MalformedInputError(`Record stream does not match schema: ${details}`, { source });
  }
  return parsed;
}
