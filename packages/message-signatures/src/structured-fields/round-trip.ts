/**
 * Round-trip check for structured field header values: parse the text as the
 * given kind, serialize it back and compare. Clients use it to confirm that
 * their encoder and this parser agree on a value before signing over it.
 */

import { parseDictionary, parseItem, parseList } from './parser.js';
import { serializeDictionary, serializeItem, serializeList } from './serializer.js';
import type { ParseResult } from './types.js';

export type StructuredFieldKind = 'item' | 'list' | 'dictionary';

export type RoundTripResult =
  | { ok: true; serialized: string }
  | { ok: false; serialized?: string; error: string };

export function checkRoundTrip(kind: StructuredFieldKind, text: string): RoundTripResult {
  const result = reserialize(kind, text);
  if (result.error) {
    return { ok: false, error: result.error.message };
  }

  const serialized = result.value;
  if (serialized !== text) {
    return {
      ok: false,
      serialized,
      error: `Serialized value does not match original: ${serialized} != ${text}`,
    };
  }

  return { ok: true, serialized };
}

function reserialize(kind: StructuredFieldKind, text: string): ParseResult<string> {
  switch (kind) {
    case 'item': {
      const parsed = parseItem(text);
      return parsed.error ? parsed : { value: serializeItem(parsed.value) };
    }
    case 'list': {
      const parsed = parseList(text);
      return parsed.error ? parsed : { value: serializeList(parsed.value) };
    }
    case 'dictionary': {
      const parsed = parseDictionary(text);
      return parsed.error ? parsed : { value: serializeDictionary(parsed.value) };
    }
  }
}
