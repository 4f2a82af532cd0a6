import { stableStringify } from '../deterministicJson';

describe('stableStringify', () => {
  test('sorts keys at every depth and keeps array order', () => {
    const value = { b: 1, a: { d: [3, { z: true, y: null }], c: 'x' } };
    expect(stableStringify(value, 0)).toBe('{"a":{"c":"x","d":[3,{"y":null,"z":true}]},"b":1}\n');
  });

  test('drops undefined members and indents by two spaces by default', () => {
    expect(stableStringify({ k: 'v', gone: undefined })).toBe('{\n  "k": "v"\n}\n');
  });

  test('insertion order does not matter', () => {
    expect(stableStringify({ x: 1, y: 2 })).toBe(stableStringify({ y: 2, x: 1 }));
  });
});
