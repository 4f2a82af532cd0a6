import crypto from 'node:crypto';

import type { IrRelationKind } from './irV1';

/** Classifier id for a class name, whether or not a class of that name exists. */
export function classifierId(name: string): string {
  return `c:${name}`;
}

/**
 * Relation ids hash the kind, both endpoints and the relation's position among
 * the source class's relations, so repeated links to one target stay distinct.
 */
export function relationId(kind: IrRelationKind, sourceId: string, targetId: string, ordinal: number): string {
  const key = `${kind}:${sourceId}->${targetId}:${ordinal}`;
  return `r:${crypto.createHash('sha1').update(key, 'utf8').digest('hex').slice(0, 16)}`;
}
