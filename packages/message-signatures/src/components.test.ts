import { describe, it, expect } from 'vitest';
import { resolveComponent } from './components.js';
import { FailureKinds } from './errors.js';
import { requestFromUrl, type HeaderMap } from './request.js';
import { parseItem, type StructuredItem } from './structured-fields/index.js';

function component(text: string): StructuredItem {
  const parsed = parseItem(text);
  if (parsed.error) {
    throw parsed.error;
  }
  return parsed.value;
}

function resolve(text: string, url = 'https://API.Example.com:8443/v1/items?b=2&a=1', headers: HeaderMap = {}) {
  return resolveComponent(requestFromUrl('post', url, headers), component(text));
}

describe('derived components', () => {
  it.each([
    ['"@method"', 'POST'],
    ['"@authority"', 'api.example.com:8443'],
    ['"@scheme"', 'https'],
    ['"@path"', '/v1/items'],
    ['"@query"', 'b=2&a=1'],
    ['"@request-target"', '/v1/items?b=2&a=1'],
    ['"@target-uri"', 'https://api.example.com:8443/v1/items?b=2&a=1'],
  ])('resolves %s', (text, expected) => {
    expect(resolve(text)).toEqual({ ok: true, value: expected });
  });

  it('resolves an absent query as an empty string', () => {
    expect(resolve('"@query"', 'https://example.com/token')).toEqual({ ok: true, value: '' });
  });

  it("omits '?' from the request target without a query", () => {
    expect(resolve('"@request-target"', 'https://example.com/token')).toEqual({ ok: true, value: '/token' });
  });

  it('decodes and joins @query-param values', () => {
    const url = 'https://example.com/search?q=hello%20world&tag=a&tag=b';

    expect(resolve('"@query-param";name="q"', url)).toEqual({ ok: true, value: 'hello world' });
    expect(resolve('"@query-param";name="tag"', url)).toEqual({ ok: true, value: 'a,b' });
  });

  it('rejects @query-param without a name', () => {
    const result = resolve('"@query-param"');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe(FailureKinds.UNRESOLVABLE_COMPONENT);
    }
  });

  it('rejects a missing query parameter', () => {
    const result = resolve('"@query-param";name="missing"');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.message).toBe("Missing query parameter 'missing' for @query-param component");
    }
  });

  it('rejects unknown derived components', () => {
    const result = resolve('"@status"');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure).toEqual({
        kind: FailureKinds.UNRESOLVABLE_COMPONENT,
        message: "Unsupported derived component '@status'",
      });
    }
  });

  it('rejects component identifiers that are not strings', () => {
    const result = resolve('method');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe(FailureKinds.UNRESOLVABLE_COMPONENT);
    }
  });
});

describe('header components', () => {
  it('looks headers up case-insensitively and trims values', () => {
    expect(resolve('"approov-token"', undefined, { 'Approov-Token': '  abc.def.ghi ' })).toEqual({
      ok: true,
      value: 'abc.def.ghi',
    });
  });

  it("joins repeated header lines with ', '", () => {
    expect(resolve('"x-forwarded-for"', undefined, { 'x-forwarded-for': ['10.0.0.1', ' 10.0.0.2'] })).toEqual({
      ok: true,
      value: '10.0.0.1, 10.0.0.2',
    });
  });

  it('keeps an empty header value', () => {
    expect(resolve('"x-empty"', undefined, { 'x-empty': '' })).toEqual({ ok: true, value: '' });
  });

  it('reports a missing header as unresolvable', () => {
    expect(resolve('"approov-token"')).toEqual({
      ok: false,
      failure: {
        kind: FailureKinds.UNRESOLVABLE_COMPONENT,
        message: "Missing header 'approov-token' referenced in signature",
      },
    });
  });

  it('strictly reserializes structured headers with ;sf', () => {
    const headers = { 'example-dict': ' a=1,    b=2;x=1;y=2,   c=(a   b   c)' };
    expect(resolve('"example-dict";sf', undefined, headers)).toEqual({
      ok: true,
      value: 'a=1, b=2;x=1;y=2, c=(a b c)',
    });
  });

  it('falls back to list and item forms with ;sf', () => {
    expect(resolve('"x-list";sf', undefined, { 'x-list': '1 ,  2' })).toEqual({ ok: true, value: '1, 2' });
    expect(resolve('"x-item";sf', undefined, { 'x-item': '  "x"  ' })).toEqual({ ok: true, value: '"x"' });
  });

  it('selects one dictionary member with ;key', () => {
    const headers = { 'example-dict': 'a=1, b=2;x=1;y=2, c=(a b c)' };
    expect(resolve('"example-dict";key="b"', undefined, headers)).toEqual({ ok: true, value: '2;x=1;y=2' });
  });

  it('rejects a ;key that is absent from the dictionary', () => {
    const result = resolve('"example-dict";key="z"', undefined, { 'example-dict': 'a=1' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.message).toBe("Header 'example-dict' dictionary missing key 'z'");
    }
  });

  it.each(['bs', 'req', 'tr'])('rejects the ;%s parameter', (param) => {
    const result = resolve(`"x-header";${param}`, undefined, { 'x-header': 'v' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.message).toBe(`Unsupported '${param}' parameter on component 'x-header'`);
    }
  });
});
