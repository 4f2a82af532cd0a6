import type { CopybookRecord } from '../copybook/ast';
import type { Model } from '../model/model';
import { HierarchyBuilder } from './hierarchyBuilder';
import { importRecord } from './importRecord';

/**
 * Import every record and reduce the bundles into a model.
 * The first failing record aborts the whole mapping.
 */
export function mapRecords(records: Iterable<CopybookRecord>): Model {
  const builder = new HierarchyBuilder();
  for (const record of records) builder.reduce(importRecord(record));
  return builder.finish();
}
