import { describe, it, expect } from 'vitest';
import {
  serializeBareItem,
  serializeDictionary,
  serializeInnerList,
  serializeItem,
  serializeList,
  serializeParameters,
} from './serializer.js';
import {
  SerializeError,
  type BareItem,
  type Parameters,
  type StructuredItem,
  type StructuredValue,
} from './types.js';

function item(value: StructuredValue, params: Parameters = new Map()): StructuredItem {
  return { value, params };
}

describe('serializeBareItem', () => {
  it.each<[BareItem, string]>([
    [{ type: 'boolean', value: true }, '?1'],
    [{ type: 'boolean', value: false }, '?0'],
    [{ type: 'integer', value: -42 }, '-42'],
    [{ type: 'string', value: 'a "quoted" \\ value' }, '"a \\"quoted\\" \\\\ value"'],
    [{ type: 'token', value: 'foo/bar:baz' }, 'foo/bar:baz'],
    [{ type: 'byte-sequence', value: new Uint8Array([1, 2, 3]) }, ':AQID:'],
    [{ type: 'date', value: 1744045540 }, '@1744045540'],
    [{ type: 'display-string', value: '50% "off" Ö' }, '%"50%25 %22off%22 %c3%96"'],
  ])('serializes %j', (value, expected) => {
    expect(serializeBareItem(value)).toBe(expected);
  });

  it('rejects strings outside printable ASCII', () => {
    expect(() => serializeBareItem({ type: 'string', value: 'tab\there' })).toThrow(SerializeError);
    expect(() => serializeBareItem({ type: 'string', value: 'café' })).toThrow(SerializeError);
  });

  it('rejects invalid tokens', () => {
    expect(() => serializeBareItem({ type: 'token', value: '1abc' })).toThrow(SerializeError);
  });

  it('rejects integers beyond 15 digits', () => {
    expect(() => serializeBareItem({ type: 'integer', value: 1_000_000_000_000_000 })).toThrow(SerializeError);
  });
});

describe('decimal serialization', () => {
  it.each<[number, string]>([
    [45, '45.0'],
    [45.1, '45.1'],
    [1.5, '1.5'],
    [134.321, '134.321'],
    [-0.25, '-0.25'],
    [0.0625, '0.062'],
    [0.1875, '0.188'],
    [2.0625, '2.062'],
    [-0.0001, '0.0'],
  ])('serializes %d as %s', (value, expected) => {
    expect(serializeBareItem({ type: 'decimal', value })).toBe(expected);
  });

  it('rejects more than 12 integer digits', () => {
    expect(() => serializeBareItem({ type: 'decimal', value: 1e12 })).toThrow(SerializeError);
  });
});

describe('containers', () => {
  it('serializes parameters, omitting the value of true booleans', () => {
    const params: Parameters = new Map<string, BareItem>([
      ['a', { type: 'boolean', value: true }],
      ['b', { type: 'boolean', value: false }],
      ['c', { type: 'integer', value: 1 }],
    ]);
    expect(serializeParameters(params)).toBe(';a;b=?0;c=1');
  });

  it('serializes inner lists with list parameters', () => {
    const components = [item({ type: 'string', value: '@method' }), item({ type: 'string', value: 'content-digest' })];
    const params: Parameters = new Map<string, BareItem>([['created', { type: 'integer', value: 1744292750 }]]);

    expect(serializeInnerList(components, params)).toBe('("@method" "content-digest");created=1744292750');
  });

  it("serializes lists with ', '", () => {
    expect(serializeList([item({ type: 'integer', value: 1 }), item({ type: 'token', value: 'b' })])).toBe('1, b');
  });

  it('serializes true dictionary members as bare keys', () => {
    const dictionary = new Map<string, StructuredItem>([
      ['a', item({ type: 'boolean', value: true }, new Map<string, BareItem>([['p', { type: 'integer', value: 1 }]]))],
      ['b', item({ type: 'boolean', value: false })],
      ['c', item({ type: 'inner-list', value: [] })],
    ]);

    expect(serializeDictionary(dictionary)).toBe('a;p=1, b=?0, c=()');
  });

  it('serializes an item with parameters', () => {
    const value = item({ type: 'string', value: 'x' }, new Map<string, BareItem>([['sf', { type: 'boolean', value: true }]]));
    expect(serializeItem(value)).toBe('"x";sf');
  });

  it('rejects invalid keys', () => {
    const dictionary = new Map<string, StructuredItem>([['Upper', item({ type: 'integer', value: 1 })]]);
    expect(() => serializeDictionary(dictionary)).toThrow(SerializeError);
  });
});
