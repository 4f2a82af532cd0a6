import type { Model, ModelClass } from '../model/model';
import { classifierId, relationId } from './ids';
import { createEmptyIrModel } from './irV1';
import type { IrAttribute, IrClassifier, IrModel, IrRelation, IrRelationKind, IrTaggedValue } from './irV1';

function tag(obj: { taggedValues?: IrTaggedValue[] }, key: string, value: string | undefined): void {
  if (value === undefined) return;
  obj.taggedValues = [...(obj.taggedValues ?? []), { key, value }];
}

/**
 * Convert a mapped copybook model into IR.
 *
 * Relations point at `c:<name>` ids whether or not a class of that name exists,
 * mirroring the name-based links of the model.
 */
export function modelToIr(model: Model): IrModel {
  const ir = createEmptyIrModel();
  const relations: IrRelation[] = [];

  const addRelation = (kind: IrRelationKind, cls: ModelClass, target: string, ordinal: number): IrRelation => {
    const sourceId = classifierId(cls.name);
    const targetId = classifierId(target);
    const r: IrRelation = { id: relationId(kind, sourceId, targetId, ordinal), kind, sourceId, targetId };
    relations.push(r);
    return r;
  };

  for (const cls of model.classes) {
    ir.classifiers.push(toClassifier(cls));

    cls.associations.forEach((a, i) => {
      const r = addRelation('ASSOCIATION', cls, a.target, i);
      tag(r, 'multiplicity', a.multiplicity);
      tag(r, 'dependsOn', a.dependsOn);
    });
    if (cls.superclass !== undefined) addRelation('GENERALIZATION', cls, cls.superclass, 0);
  }

  ir.relations = relations;
  return ir;
}

function toClassifier(cls: ModelClass): IrClassifier {
  const attributes = cls.properties.map((p): IrAttribute => {
    const attr: IrAttribute = { name: p.name, type: { kind: 'PRIMITIVE', name: p.type } };
    if (p.signed) tag(attr, 'signed', 'true');
    return attr;
  });
  return { id: classifierId(cls.name), name: cls.name, kind: 'CLASS', attributes };
}
