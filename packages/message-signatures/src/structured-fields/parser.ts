/**
 * Structured Field Values parser
 *
 * Follows the parsing algorithms of RFC 8941 Section 4.2, extended with the
 * Date (`@1659578233`) and Display String (`%"caf%c3%a9"`) types of RFC 9651.
 * Any deviation from the grammar fails the whole parse; there are no partial results.
 */

import {
  ParseError,
  type BareItem,
  type ParseResult,
  type Parameters,
  type StructuredDictionary,
  type StructuredItem,
  type StructuredList,
} from './types.js';

const MAX_INTEGER_DIGITS = 15;
const MAX_DECIMAL_CHARS = 16;
const MAX_DECIMAL_INTEGER_DIGITS = 12;
const MAX_DECIMAL_FRACTION_DIGITS = 3;

const DIGIT = /^[0-9]$/;
const ALPHA = /^[A-Za-z]$/;
const LCALPHA = /^[a-z]$/;
const KEY_CHAR = /^[a-z0-9_\-.*]$/;
const TOKEN_CHAR = /^[!#$%&'*+\-.^_`|~0-9A-Za-z:/]$/;
const BASE64 = /^[A-Za-z0-9+/=]*$/;
const LCHEX = /^[0-9a-f]{2}$/;

/**
 * Parse a header value as an Item (a bare item or an inner list, with parameters)
 */
export function parseItem(input: string): ParseResult<StructuredItem> {
  return run(input, (parser) => parser.parseTopLevelItem());
}

/**
 * Parse a header value as a List
 */
export function parseList(input: string): ParseResult<StructuredList> {
  return run(input, (parser) => parser.parseTopLevelList());
}

/**
 * Parse a header value as a Dictionary
 */
export function parseDictionary(input: string): ParseResult<StructuredDictionary> {
  return run(input, (parser) => parser.parseTopLevelDictionary());
}

function run<T>(input: string, parse: (parser: Parser) => T): ParseResult<T> {
  const parser = new Parser(input);
  try {
    return { value: parse(parser) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { error };
    }
    throw error;
  }
}

class Parser {
  private pos = 0;

  constructor(private readonly input: string) {}

  parseTopLevelItem(): StructuredItem {
    this.skipSP();
    const item = this.parseItemOrInnerList();
    this.skipSP();
    this.expectEnd();
    return item;
  }

  parseTopLevelList(): StructuredList {
    const members: StructuredList = [];
    this.skipSP();

    while (!this.atEnd()) {
      members.push(this.parseItemOrInnerList());
      if (!this.skipMemberSeparator()) {
        break;
      }
    }

    this.expectEnd();
    return members;
  }

  parseTopLevelDictionary(): StructuredDictionary {
    const dictionary: StructuredDictionary = new Map();
    this.skipSP();

    while (!this.atEnd()) {
      const key = this.parseKey();
      let member: StructuredItem;

      if (this.peek() === '=') {
        this.pos++;
        member = this.parseItemOrInnerList();
      } else {
        member = {
          value: { type: 'boolean', value: true },
          params: this.parseParameters(),
        };
      }

      // Map#set keeps the original position of a repeated key
      dictionary.set(key, member);

      if (!this.skipMemberSeparator()) {
        break;
      }
    }

    this.expectEnd();
    return dictionary;
  }

  /**
   * Consume OWS "," OWS between list or dictionary members.
   * Returns false when the input ends after the member.
   */
  private skipMemberSeparator(): boolean {
    this.skipOWS();
    if (this.atEnd()) {
      return false;
    }
    if (this.peek() !== ',') {
      this.fail(`Expected "," between members, found "${this.peek()}"`);
    }
    this.pos++;
    this.skipOWS();
    if (this.atEnd()) {
      this.fail('Trailing comma at end of input');
    }
    return true;
  }

  private parseItemOrInnerList(): StructuredItem {
    if (this.peek() === '(') {
      return this.parseInnerList();
    }
    return this.parseItem();
  }

  private parseInnerList(): StructuredItem {
    this.pos++;
    const items: StructuredItem[] = [];

    while (!this.atEnd()) {
      this.skipSP();

      if (this.peek() === ')') {
        this.pos++;
        return {
          value: { type: 'inner-list', value: items },
          params: this.parseParameters(),
        };
      }

      items.push(this.parseItem());

      const next = this.peek();
      if (next !== ' ' && next !== ')') {
        this.fail('Inner list members must be separated by a space');
      }
    }

    return this.fail('Unterminated inner list');
  }

  private parseItem(): StructuredItem {
    const value = this.parseBareItem();
    const params = this.parseParameters();
    return { value, params };
  }

  private parseBareItem(): BareItem {
    const c = this.peek();

    if (c === '-' || DIGIT.test(c)) {
      return this.parseNumber();
    }
    if (c === '"') {
      return this.parseString();
    }
    if (c === '*' || ALPHA.test(c)) {
      return this.parseToken();
    }
    if (c === ':') {
      return this.parseByteSequence();
    }
    if (c === '?') {
      return this.parseBoolean();
    }
    if (c === '@') {
      return this.parseDate();
    }
    if (c === '%') {
      return this.parseDisplayString();
    }
    return this.fail(c === '' ? 'Unexpected end of input' : `Unexpected character "${c}"`);
  }

  private parseParameters(): Parameters {
    const params: Parameters = new Map();

    while (this.peek() === ';') {
      this.pos++;
      this.skipSP();
      const key = this.parseKey();
      let value: BareItem = { type: 'boolean', value: true };

      if (this.peek() === '=') {
        this.pos++;
        value = this.parseBareItem();
      }

      params.set(key, value);
    }

    return params;
  }

  private parseKey(): string {
    const first = this.peek();
    if (first !== '*' && !LCALPHA.test(first)) {
      this.fail(`Key must start with a lowercase letter or "*", found "${first}"`);
    }

    const start = this.pos;
    this.pos++;
    while (KEY_CHAR.test(this.peek())) {
      this.pos++;
    }
    return this.input.slice(start, this.pos);
  }

  private parseNumber(): BareItem {
    let sign = 1;
    let isDecimal = false;
    let digits = '';

    if (this.peek() === '-') {
      this.pos++;
      sign = -1;
    }

    if (!DIGIT.test(this.peek())) {
      this.fail('Expected a digit');
    }

    while (!this.atEnd()) {
      const c = this.peek();

      if (DIGIT.test(c)) {
        digits += c;
      } else if (!isDecimal && c === '.') {
        if (digits.length > MAX_DECIMAL_INTEGER_DIGITS) {
          this.fail('Decimal has more than 12 integer digits');
        }
        digits += c;
        isDecimal = true;
      } else {
        break;
      }
      this.pos++;

      if (!isDecimal && digits.length > MAX_INTEGER_DIGITS) {
        this.fail('Integer has more than 15 digits');
      }
      if (isDecimal && digits.length > MAX_DECIMAL_CHARS) {
        this.fail('Decimal is too long');
      }
    }

    if (!isDecimal) {
      const value = sign * parseInt(digits, 10);
      return { type: 'integer', value: value === 0 ? 0 : value };
    }

    if (digits.endsWith('.')) {
      this.fail('Decimal must have a fractional part');
    }
    const fraction = digits.slice(digits.indexOf('.') + 1);
    if (fraction.length > MAX_DECIMAL_FRACTION_DIGITS) {
      this.fail('Decimal has more than 3 fractional digits');
    }

    const value = sign * parseFloat(digits);
    return { type: 'decimal', value: value === 0 ? 0 : value };
  }

  private parseString(): BareItem {
    this.pos++;
    let output = '';

    while (!this.atEnd()) {
      const c = this.input[this.pos++];

      if (c === '\\') {
        const escaped = this.peek();
        if (escaped !== '"' && escaped !== '\\') {
          this.fail('Invalid escape sequence in string');
        }
        output += escaped;
        this.pos++;
      } else if (c === '"') {
        return { type: 'string', value: output };
      } else {
        const code = c.charCodeAt(0);
        if (code < 0x20 || code > 0x7e) {
          this.fail(`Invalid character U+${code.toString(16).padStart(4, '0')} in string`);
        }
        output += c;
      }
    }

    return this.fail('Unterminated string');
  }

  private parseToken(): BareItem {
    const start = this.pos;
    this.pos++;
    while (TOKEN_CHAR.test(this.peek())) {
      this.pos++;
    }
    return { type: 'token', value: this.input.slice(start, this.pos) };
  }

  private parseByteSequence(): BareItem {
    this.pos++;
    const end = this.input.indexOf(':', this.pos);
    if (end === -1) {
      this.fail('Unterminated byte sequence');
    }

    const encoded = this.input.slice(this.pos, end);
    if (!BASE64.test(encoded)) {
      this.fail('Invalid base64 in byte sequence');
    }

    this.pos = end + 1;
    return { type: 'byte-sequence', value: new Uint8Array(Buffer.from(encoded, 'base64')) };
  }

  private parseBoolean(): BareItem {
    this.pos++;
    const c = this.peek();
    if (c === '1' || c === '0') {
      this.pos++;
      return { type: 'boolean', value: c === '1' };
    }
    return this.fail('Boolean must be ?0 or ?1');
  }

  private parseDate(): BareItem {
    this.pos++;
    const number = this.parseNumber();
    if (number.type !== 'integer') {
      this.fail('Date must be an integer');
    }
    return { type: 'date', value: number.value };
  }

  private parseDisplayString(): BareItem {
    this.pos++;
    if (this.peek() !== '"') {
      this.fail('Display string must start with %"');
    }
    this.pos++;

    const bytes: number[] = [];
    while (!this.atEnd()) {
      const c = this.input[this.pos++];
      const code = c.charCodeAt(0);

      if (code < 0x20 || code > 0x7e) {
        this.fail(`Invalid character U+${code.toString(16).padStart(4, '0')} in display string`);
      }

      if (c === '%') {
        const hex = this.input.slice(this.pos, this.pos + 2);
        if (!LCHEX.test(hex)) {
          this.fail('Display string escapes must be two lowercase hex digits');
        }
        bytes.push(parseInt(hex, 16));
        this.pos += 2;
      } else if (c === '"') {
        try {
          const value = new TextDecoder('utf-8', { fatal: true }).decode(new Uint8Array(bytes));
          return { type: 'display-string', value };
        } catch {
          return this.fail('Display string is not valid UTF-8');
        }
      } else {
        bytes.push(code);
      }
    }

    return this.fail('Unterminated display string');
  }

  private skipSP(): void {
    while (this.peek() === ' ') {
      this.pos++;
    }
  }

  private skipOWS(): void {
    while (this.peek() === ' ' || this.peek() === '\t') {
      this.pos++;
    }
  }

  private expectEnd(): void {
    if (!this.atEnd()) {
      this.fail(`Unexpected trailing characters "${this.input.slice(this.pos)}"`);
    }
  }

  private atEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private peek(): string {
    return this.input.charAt(this.pos);
  }

  private fail(message: string): never {
    throw new ParseError(message, this.pos);
  }
}
