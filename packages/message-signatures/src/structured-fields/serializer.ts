/**
 * Structured Field Values serializer
 *
 * The inverse of parser.ts: serializing a value parsed from canonical text
 * reproduces that text byte for byte.
 */

import {
  SerializeError,
  type BareItem,
  type Parameters,
  type StructuredDictionary,
  type StructuredItem,
  type StructuredList,
  type StructuredValue,
} from './types.js';

const MAX_INTEGER = 999_999_999_999_999;
const MAX_DECIMAL_INTEGER_PART = 999_999_999_999;

const KEY = /^[a-z*][a-z0-9_\-.*]*$/;
const TOKEN = /^[A-Za-z*][!#$%&'*+\-.^_`|~0-9A-Za-z:/]*$/;

export function serializeItem(item: StructuredItem): string {
  return serializeValue(item.value) + serializeParameters(item.params);
}

export function serializeInnerList(items: StructuredItem[], params: Parameters = new Map()): string {
  return `(${items.map(serializeItem).join(' ')})${serializeParameters(params)}`;
}

export function serializeList(list: StructuredList): string {
  return list.map(serializeItem).join(', ');
}

export function serializeDictionary(dictionary: StructuredDictionary): string {
  const members: string[] = [];

  for (const [key, member] of dictionary) {
    const value = member.value;
    if (value.type === 'boolean' && value.value) {
      members.push(serializeKey(key) + serializeParameters(member.params));
    } else {
      members.push(`${serializeKey(key)}=${serializeItem(member)}`);
    }
  }

  return members.join(', ');
}

export function serializeParameters(params: Parameters): string {
  let output = '';

  for (const [key, value] of params) {
    output += `;${serializeKey(key)}`;
    if (value.type === 'boolean' && value.value) {
      continue;
    }
    output += `=${serializeBareItem(value)}`;
  }

  return output;
}

export function serializeBareItem(item: BareItem): string {
  switch (item.type) {
    case 'boolean':
      return item.value ? '?1' : '?0';
    case 'integer':
      return serializeInteger(item.value);
    case 'decimal':
      return serializeDecimal(item.value);
    case 'string':
      return serializeString(item.value);
    case 'token':
      return serializeToken(item.value);
    case 'byte-sequence':
      return `:${Buffer.from(item.value).toString('base64')}:`;
    case 'date':
      return `@${serializeInteger(item.value)}`;
    case 'display-string':
      return serializeDisplayString(item.value);
    default:
      return assertNever(item);
  }
}

function serializeValue(value: StructuredValue): string {
  if (value.type === 'inner-list') {
    return `(${value.value.map(serializeItem).join(' ')})`;
  }
  return serializeBareItem(value);
}

function serializeKey(key: string): string {
  if (!KEY.test(key)) {
    throw new SerializeError(`Invalid key "${key}"`);
  }
  return key;
}

function serializeInteger(value: number): string {
  if (!Number.isInteger(value) || Math.abs(value) > MAX_INTEGER) {
    throw new SerializeError(`Integer out of range: ${value}`);
  }
  return String(value === 0 ? 0 : value);
}

/**
 * At most three fractional digits, rounded half to even; trailing zeros are
 * dropped but one fractional digit always remains.
 */
function serializeDecimal(value: number): string {
  if (!Number.isFinite(value)) {
    throw new SerializeError('Decimal must be finite');
  }

  const scaled = roundHalfEven(Math.abs(value) * 1000);
  const integerPart = Math.floor(scaled / 1000);
  if (integerPart > MAX_DECIMAL_INTEGER_PART) {
    throw new SerializeError('Decimal has more than 12 integer digits');
  }

  const fraction = String(scaled % 1000).padStart(3, '0').replace(/0+$/, '') || '0';
  const sign = value < 0 && scaled !== 0 ? '-' : '';
  return `${sign}${integerPart}.${fraction}`;
}

function roundHalfEven(n: number): number {
  const floor = Math.floor(n);
  const diff = n - floor;
  if (diff > 0.5) {
    return floor + 1;
  }
  if (diff < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

function serializeString(value: string): string {
  let output = '"';

  for (const c of value) {
    const code = c.charCodeAt(0);
    if (c.length > 1 || code < 0x20 || code > 0x7e) {
      throw new SerializeError(`Invalid character U+${code.toString(16).padStart(4, '0')} in string`);
    }
    if (c === '"' || c === '\\') {
      output += '\\';
    }
    output += c;
  }

  return output + '"';
}

function serializeToken(value: string): string {
  if (!TOKEN.test(value)) {
    throw new SerializeError(`Invalid token "${value}"`);
  }
  return value;
}

function serializeDisplayString(value: string): string {
  let output = '%"';

  for (const byte of new TextEncoder().encode(value)) {
    if (byte >= 0x20 && byte <= 0x7e && byte !== 0x25 && byte !== 0x22) {
      output += String.fromCharCode(byte);
    } else {
      output += `%${byte.toString(16).padStart(2, '0')}`;
    }
  }

  return output + '"';
}

function assertNever(value: never): never {
  throw new SerializeError(`Unsupported structured field value: ${JSON.stringify(value)}`);
}
