export type {
  BareItem,
  BareItemType,
  InnerList,
  Parameters,
  ParseResult,
  StructuredDictionary,
  StructuredItem,
  StructuredList,
  StructuredValue,
} from './types.js';
export { ParseError, SerializeError } from './types.js';

export { parseItem, parseList, parseDictionary } from './parser.js';

export {
  serializeItem,
  serializeInnerList,
  serializeList,
  serializeDictionary,
  serializeParameters,
  serializeBareItem,
} from './serializer.js';

export { checkRoundTrip } from './round-trip.js';
export type { StructuredFieldKind, RoundTripResult } from './round-trip.js';
