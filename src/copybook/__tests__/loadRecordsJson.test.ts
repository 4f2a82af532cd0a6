import { MalformedInputError } from '../../errors';
import { loadRecordsJson } from '../loadRecordsJson';

describe('loadRecordsJson', () => {
  test('loads a valid record stream as-is', () => {
    const stream = [
      { kind: 'basic', level: '01', name: 'ROOT', options: [] },
      {
        kind: 'basic',
        level: '05',
        name: 'AMOUNT',
        options: [{ kind: 'picture-format', type: 'S9', digits: '5', decimalType: 'V9', decimalDigits: '2' }],
        source: { file: 'r.json', line: 2, text: '05 AMOUNT PIC S9(5)V9(2).' },
      },
      {
        kind: 'basic',
        level: '05',
        name: 'ITEMS',
        options: [{ kind: 'occurs', amount: { kind: 'int', value: '3' }, keys: [], indexes: [] }],
      },
    ];
    expect(loadRecordsJson(JSON.stringify(stream))).toEqual(stream);
  });

  test('unknown kind tags pass the schema and are left for the importer', () => {
    const records = loadRecordsJson('[{"kind":"mystery","level":"01","options":[{"kind":"odd"}]}]');
    expect(records).toHaveLength(1);
    expect(records[0]?.kind).toBe('mystery');
  });

  test('invalid JSON is malformed input', () => {
    expect(() => loadRecordsJson('[{', 'bad.json')).toThrow(MalformedInputError);
    expect(() => loadRecordsJson('[{', 'bad.json')).toThrow(/^bad\.json - Invalid JSON record stream: /);
  });

  test('schema violations are reported with their path', () => {
    expect(() => loadRecordsJson('{"kind":"basic"}')).toThrow('Record stream does not match schema: / must be array');
    expect(() => loadRecordsJson('[{"kind":"basic","options":[]}]')).toThrow(
      "/0 must have required property 'level'",
    );
    expect(() =>
      loadRecordsJson('[{"kind":"basic","level":"05","options":[{"kind":"redefines"}]}]'),
    ).toThrow("/0/options/0 must have required property 'redefined'");
    expect(() => loadRecordsJson('[{"kind":"renames","level":"66","options":[]}]')).toThrow(
      "/0 must have required property 'renamed'",
    );
  });
});
