import { addAssociation, createClass } from '../../model/model';
import { relationId } from '../ids';
import { modelToIr } from '../modelToIr';

describe('modelToIr', () => {
  const line = createClass('LINE');
  line.properties.push({ name: 'QTY', type: 'integer', signed: false });
  line.properties.push({ name: 'PRICE', type: 'float', signed: true });

  const order = createClass('ORDER');
  addAssociation(order, 'LINE', { multiplicity: '1..9', dependsOn: 'LINE-COUNT' });
  addAssociation(order, 'NOTE');

  const alt = createClass('ALT', 'ORIG');

  const ir = modelToIr({ classes: [line, order, alt] });

  test('one classifier per class, attributes in declaration order', () => {
    expect(ir.classifiers).toEqual([
      {
        id: 'c:LINE',
        name: 'LINE',
        kind: 'CLASS',
        attributes: [
          { name: 'QTY', type: { kind: 'PRIMITIVE', name: 'integer' } },
          {
            name: 'PRICE',
            type: { kind: 'PRIMITIVE', name: 'float' },
            taggedValues: [{ key: 'signed', value: 'true' }],
          },
        ],
      },
      { id: 'c:ORDER', name: 'ORDER', kind: 'CLASS', attributes: [] },
      { id: 'c:ALT', name: 'ALT', kind: 'CLASS', attributes: [] },
    ]);
  });

  test('associations and generalizations become relations by name, resolved or not', () => {
    expect(ir.relations).toEqual([
      {
        id: relationId('ASSOCIATION', 'c:ORDER', 'c:LINE', 0),
        kind: 'ASSOCIATION',
        sourceId: 'c:ORDER',
        targetId: 'c:LINE',
        taggedValues: [
          { key: 'multiplicity', value: '1..9' },
          { key: 'dependsOn', value: 'LINE-COUNT' },
        ],
      },
      {
        id: relationId('ASSOCIATION', 'c:ORDER', 'c:NOTE', 1),
        kind: 'ASSOCIATION',
        sourceId: 'c:ORDER',
        targetId: 'c:NOTE',
      },
      {
        id: relationId('GENERALIZATION', 'c:ALT', 'c:ORIG', 0),
        kind: 'GENERALIZATION',
        sourceId: 'c:ALT',
        targetId: 'c:ORIG',
      },
    ]);
  });

  test('relation ids are stable and distinct', () => {
    const again = modelToIr({ classes: [line, order, alt] });
    expect(again.relations?.map((r) => r.id)).toEqual(ir.relations?.map((r) => r.id));
    expect(new Set(ir.relations?.map((r) => r.id)).size).toBe(3);
    for (const r of ir.relations ?? []) expect(r.id).toMatch(/^r:[0-9a-f]{16}$/);
  });
});
