/**
 * Structured Field Values (RFC 8941, with the RFC 9651 Date and
 * Display String types)
 */

/**
 * A bare item: every value a parameter may hold
 */
export type BareItem =
  | { type: 'boolean'; value: boolean }
  | { type: 'integer'; value: number }
  | { type: 'decimal'; value: number }
  | { type: 'string'; value: string }
  | { type: 'token'; value: string }
  | { type: 'byte-sequence'; value: Uint8Array }
  | { type: 'date'; value: number }
  | { type: 'display-string'; value: string };

export type BareItemType = BareItem['type'];

/**
 * Ordered parameters. Values are bare items, so parameters never nest.
 */
export type Parameters = Map<string, BareItem>;

/**
 * An inner list: `(a b c)`. Its own parameters live on the enclosing item.
 */
export interface InnerList {
  type: 'inner-list';
  value: StructuredItem[];
}

export type StructuredValue = BareItem | InnerList;

/**
 * A value plus its parameters. A list or dictionary member is always one of these.
 */
export interface StructuredItem {
  value: StructuredValue;
  params: Parameters;
}

export type StructuredList = StructuredItem[];

/**
 * Insertion order is kept for serialization; lookup is by key.
 */
export type StructuredDictionary = Map<string, StructuredItem>;

/**
 * Structured field parse error with the offset where parsing stopped
 */
export class ParseError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = 'ParseError';
    this.offset = offset;
  }
}

/**
 * Raised when a value cannot be represented in the structured field grammar
 */
export class SerializeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SerializeError';
  }
}

/**
 * Result of parsing a header value
 */
export type ParseResult<T> =
  | { value: T; error?: never }
  | { value?: never; error: ParseError };
