import { CopybookSyntaxError } from '../../errors';
import { tokenize } from '../lexer';
import { parseCopybook, parsePicture } from '../parser';

const CUSTOMER = `
      * customer record
       01  CUSTOMER-REC.
           05  CUST-ID          PIC 9(6).
           05  CUST-NAME        PIC X(30).
           05  BALANCE          PIC S9(7)V9(2) SIGN LEADING SEPARATE.
           05  ORDERS           OCCURS 1 TO 10 TIMES DEPENDING ON ORDER-COUNT.
               10  ORDER-NO     PIC 9(8).
           05  FILLER           PIC X(4).
`;

describe('tokenize', () => {
  test('keeps inner periods in words and splits the separator period', () => {
    const tokens = tokenize('05 AMT PIC S9(5)V9(2) VALUE 1.5.');
    expect(tokens.map((t) => [t.type, t.text])).toEqual([
      ['word', '05'],
      ['word', 'AMT'],
      ['word', 'PIC'],
      ['word', 'S9(5)V9(2)'],
      ['word', 'VALUE'],
      ['word', '1.5'],
      ['period', '.'],
    ]);
  });

  test('string literals, doubled quotes and comma separators', () => {
    const tokens = tokenize(`88 OK VALUES 'it''s', "Y".`);
    expect(tokens.map((t) => [t.type, t.text])).toEqual([
      ['word', '88'],
      ['word', 'OK'],
      ['word', 'VALUES'],
      ['string', "it's"],
      ['string', 'Y'],
      ['period', '.'],
    ]);
  });

  test('comment lines and inline comments are skipped', () => {
    const tokens = tokenize(['* header', '/ page', '01 REC. *> trailing note'].join('\n'));
    expect(tokens.map((t) => t.text)).toEqual(['01', 'REC', '.']);
    expect(tokens[0]).toMatchObject({ line: 3, column: 1 });
  });

  test('fixed format drops the sequence area but keeps columns', () => {
    const tokens = tokenize(['000100 01  REC.', '000200*    comment', '000300     05 A PIC X.'].join('\n'));
    expect(tokens.map((t) => t.text)).toEqual(['01', 'REC', '.', '05', 'A', 'PIC', 'X', '.']);
    expect(tokens[0]).toMatchObject({ line: 1, column: 8 });
    expect(tokens[3]).toMatchObject({ line: 3, column: 12 });
  });

  test('unterminated string is a syntax error', () => {
    expect(() => tokenize("05 A PIC X VALUE 'abc.", 'a.cpy')).toThrow(CopybookSyntaxError);
    expect(() => tokenize("05 A PIC X VALUE 'abc.", 'a.cpy')).toThrow('a.cpy:1:18 - Unterminated string literal');
  });
});

describe('parsePicture', () => {
  test.each([
    ['X', { kind: 'picture-format', type: 'X' }],
    ['X(30)', { kind: 'picture-format', type: 'X', digits: '30' }],
    ['a(2)', { kind: 'picture-format', type: 'A', digits: '2' }],
    ['9(6)', { kind: 'picture-format', type: '9', digits: '6' }],
    ['S9(7)V9(2)', { kind: 'picture-format', type: 'S9', digits: '7', decimalType: 'V9', decimalDigits: '2' }],
    ['9V9', { kind: 'picture-format', type: '9', decimalType: 'V9' }],
    ['ZZ9.99', { kind: 'picture-string', picture: 'ZZ9.99' }],
    ['XXX', { kind: 'picture-format', type: 'X', digits: '3' }],
    ['99', { kind: 'picture-format', type: '9', digits: '2' }],
    ['S99(3)', { kind: 'picture-format', type: 'S9', digits: '4' }],
    ['9(5)V99', { kind: 'picture-format', type: '9', digits: '5', decimalType: 'V9', decimalDigits: '2' }],
    ['S9(3)V99', { kind: 'picture-format', type: 'S9', digits: '3', decimalType: 'V9', decimalDigits: '2' }],
    ['SX(3)', { kind: 'picture-string', picture: 'SX(3)' }],
    ['XX9', { kind: 'picture-string', picture: 'XX9' }],
  ])('%s', (picture, expected) => {
    expect(parsePicture(picture)).toEqual(expected);
  });
});

describe('parseCopybook', () => {
  test('parses a customer record into basic records with their clauses', () => {
    const records = parseCopybook(CUSTOMER, { source: 'customer.cpy' });

    expect(records.map((r) => [r.level, r.name])).toEqual([
      ['01', 'CUSTOMER-REC'],
      ['05', 'CUST-ID'],
      ['05', 'CUST-NAME'],
      ['05', 'BALANCE'],
      ['05', 'ORDERS'],
      ['10', 'ORDER-NO'],
      ['05', undefined],
    ]);
    expect(records.every((r) => r.kind === 'basic')).toBe(true);

    expect(records[0]?.options).toEqual([]);
    expect(records[3]?.options).toEqual([
      { kind: 'picture-format', type: 'S9', digits: '7', decimalType: 'V9', decimalDigits: '2' },
      { kind: 'sign', leading: true, separate: true, character: false },
    ]);
    expect(records[4]?.options).toEqual([
      {
        kind: 'occurs',
        amount: { kind: 'int', value: '1' },
        upperBound: { kind: 'int', value: '10' },
        dependsOn: 'ORDER-COUNT',
        keys: [],
        indexes: [],
      },
    ]);
    expect(records[6]?.options).toEqual([{ kind: 'picture-format', type: 'X', digits: '4' }]);
  });

  test('records carry their source line and normalized text', () => {
    const records = parseCopybook(CUSTOMER, { source: 'customer.cpy' });
    expect(records[0]?.source).toEqual({ file: 'customer.cpy', line: 3, text: '01 CUSTOMER-REC.' });
    expect(records[3]?.source).toEqual({
      file: 'customer.cpy',
      line: 6,
      text: '05 BALANCE PIC S9(7)V9(2) SIGN LEADING SEPARATE.',
    });
  });

  test('value literals', () => {
    const records = parseCopybook(
      [
        "05 A PIC X VALUE 'Y'.",
        '05 B PIC 9 VALUE IS 10.',
        '05 C PIC 9V9 VALUE -1.5.',
        '05 D PIC X VALUE SPACES.',
        '05 E PIC 9 VALUE ZERO.',
        "05 F PIC X VALUE ALL '*'.",
        '05 G PIC X VALUE HIGH-VALUES.',
        '05 H PIC X VALUE LOW-VALUE.',
        '05 I PIC X VALUE NULL.',
        '05 J PIC X VALUE OTHER-FIELD.',
      ].join('\n'),
    );
    expect(records.map((r) => r.options[1])).toEqual([
      { kind: 'string', value: 'Y' },
      { kind: 'int', value: '10' },
      { kind: 'float', value: '-1.5' },
      { kind: 'space' },
      { kind: 'zero' },
      { kind: 'all-string', value: '*' },
      { kind: 'high-value' },
      { kind: 'low-value' },
      { kind: 'null' },
      { kind: 'variable', name: 'OTHER-FIELD' },
    ]);
  });

  test('usage, sign and layout clauses', () => {
    const records = parseCopybook(
      [
        '05 A PIC 9(4) COMP-3.',
        '05 B PIC 9(4) USAGE IS BINARY.',
        '05 C PIC 9(4) COMPUTATIONAL.',
        '05 D PIC 9(5) PACKED-DECIMAL.',
        '05 E PIC X DISPLAY.',
        '05 F USAGE INDEX.',
        '05 G PIC S9 SIGN IS TRAILING SEPARATE CHARACTER.',
        '05 H PIC X SYNC LEFT.',
        '05 I PIC X JUSTIFIED RIGHT.',
        '05 J PIC 9 BLANK WHEN ZEROES.',
        '05 K PIC X EXTERNAL.',
        '05 L PIC X GLOBAL.',
      ].join('\n'),
    );
    expect(records.map((r) => r.options[r.options.length - 1])).toEqual([
      { kind: 'comp-usage', level: '3' },
      { kind: 'binary-usage' },
      { kind: 'comp-usage', level: '0' },
      { kind: 'packed-decimal-usage' },
      { kind: 'display-usage' },
      { kind: 'index-usage' },
      { kind: 'sign', leading: false, separate: true, character: true },
      { kind: 'sync' },
      { kind: 'just' },
      { kind: 'blank' },
      { kind: 'external' },
      { kind: 'internal' },
    ]);
  });

  test('redefines and occurs keys/indexes', () => {
    const [alt, table] = parseCopybook(
      [
        '05 ALT REDEFINES ORIG.',
        '05 T OCCURS 5 TIMES ASCENDING KEY IS T-KEY INDEXED BY T-IDX.',
      ].join('\n'),
    );
    expect(alt?.options).toEqual([{ kind: 'redefines', redefined: 'ORIG' }]);
    expect(table?.options).toEqual([
      { kind: 'occurs', amount: { kind: 'int', value: '5' }, keys: ['T-KEY'], indexes: ['T-IDX'] },
    ]);
  });

  test('identifier occurs amount stays an identifier operand', () => {
    const [rec] = parseCopybook('05 T OCCURS N-ROWS TIMES.');
    expect(rec?.options).toEqual([
      { kind: 'occurs', amount: { kind: 'identifier', name: 'N-ROWS' }, keys: [], indexes: [] },
    ]);
  });

  test('level 66 and 88 entries', () => {
    const [renames, values, range] = parseCopybook(
      ['66 ALIAS RENAMES A THRU B.', "88 IS-ACTIVE VALUE 'Y' 'A'.", '88 IN-RANGE VALUES ARE 1 THRU 9.'].join('\n'),
    );
    expect(renames).toMatchObject({ kind: 'renames', level: '66', name: 'ALIAS', renamed: 'A', through: 'B', options: [] });
    expect(values).toMatchObject({
      kind: 'values',
      name: 'IS-ACTIVE',
      options: [
        { kind: 'string', value: 'Y' },
        { kind: 'string', value: 'A' },
      ],
    });
    expect(range?.options).toEqual([
      { kind: 'int', value: '1' },
      { kind: 'int', value: '9' },
    ]);
  });

  test('syntax errors carry location and line text', () => {
    expect(() => parseCopybook('01 REC', { source: 'x.cpy' })).toThrow(
      'x.cpy:1:4 - Missing period at end of entry\n    01 REC',
    );
    expect(() => parseCopybook('05 A PIC X FOO.')).toThrow("1:12 - Unexpected 'FOO'");
    expect(() => parseCopybook('AB REC.')).toThrow("Expected level number, found 'AB'");
    expect(() => parseCopybook('05 A PIC.')).toThrow(CopybookSyntaxError);
  });

  test('empty text has no records', () => {
    expect(parseCopybook('')).toEqual([]);
    expect(parseCopybook('   \n      * only a comment\n')).toEqual([]);
  });
});
