import type { IrAttribute, IrClassifier, IrModel, IrRelation, IrTaggedValue } from './irV1';

/**
 * Canonicalize an IR model for deterministic output.
 *
 * We sort arrays that are expected to be order-insensitive:
 * - classifiers, relations
 * - taggedValues
 *
 * Attributes keep their order: it is the field declaration order of the copybook.
 */
export function canonicalizeIrModel(model: IrModel): IrModel {
  return {
    ...model,
    classifiers: sortById(model.classifiers ?? []).map(canonicalizeClassifier),
    relations: sortById(model.relations ?? []).map(canonicalizeRelation),
    taggedValues: canonicalizeTaggedValues(model.taggedValues ?? []),
  };
}

function canonicalizeClassifier(c: IrClassifier): IrClassifier {
  return {
    ...c,
    attributes: (c.attributes ?? []).map(canonicalizeAttribute),
    taggedValues: canonicalizeTaggedValues(c.taggedValues),
  };
}

function canonicalizeAttribute(a: IrAttribute): IrAttribute {
  return {
    ...a,
    taggedValues: canonicalizeTaggedValues(a.taggedValues),
  };
}

function canonicalizeRelation(r: IrRelation): IrRelation {
  return {
    ...r,
    taggedValues: canonicalizeTaggedValues(r.taggedValues),
  };
}

function canonicalizeTaggedValues(arr?: IrTaggedValue[]): IrTaggedValue[] {
  return (arr ?? [])
    .slice()
    .sort((a, b) => (a.key === b.key ? a.value.localeCompare(b.value) : a.key.localeCompare(b.key)));
}

function sortById<T extends { id: string }>(arr: T[]): T[] {
  return arr.slice().sort((a, b) => a.id.localeCompare(b.id));
}
