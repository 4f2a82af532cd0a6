/**
 * IR data model (v1): a tool-neutral class diagram.
 *
 * Source of truth: src/ir/schema/ir-schema-v1.json
 */

export type IrSchemaVersion = string;

export type IrTaggedValue = {
  key: string;
  value: string;
};

export type IrTypeRefKind = 'NAMED' | 'PRIMITIVE' | 'UNKNOWN';

export type IrTypeRef = {
  kind: IrTypeRefKind;
  name?: string | null;
  taggedValues?: IrTaggedValue[];
};

export type IrClassifierKind = 'CLASS';

export type IrAttribute = {
  id?: string | null;
  name: string;
  type: IrTypeRef;
  taggedValues?: IrTaggedValue[];
};

export type IrClassifier = {
  id: string;
  name: string;
  kind: IrClassifierKind;
  attributes?: IrAttribute[];
  taggedValues?: IrTaggedValue[];
};

export type IrRelationKind = 'GENERALIZATION' | 'ASSOCIATION';

export type IrRelation = {
  id: string;
  kind: IrRelationKind;
  sourceId: string;
  /** May reference a classifier that is not part of the model (unresolved name). */
  targetId: string;
  name?: string | null;
  taggedValues?: IrTaggedValue[];
};

export type IrModel = {
  schemaVersion: IrSchemaVersion;
  classifiers: IrClassifier[];
  relations?: IrRelation[];
  taggedValues?: IrTaggedValue[];
};

export function createEmptyIrModel(): IrModel {
  return {
    schemaVersion: '1.0',
    classifiers: [],
    relations: [],
    taggedValues: [],
  };
}
