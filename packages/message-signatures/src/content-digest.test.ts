import { describe, it, expect, vi } from 'vitest';
import { createHash } from 'node:crypto';
import { checkDigests, computeContentDigest, verifyContentDigest } from './content-digest.js';
import { FailureKinds } from './errors.js';
import { bufferedBody, requestFromUrl, type BodySource } from './request.js';
import { parseDictionary } from './structured-fields/index.js';

const BODY = '{"hello":"world"}';
const SHA256 = createHash('sha256').update(BODY).digest('base64');
const SHA512 = createHash('sha512').update(BODY).digest('base64');

function post(headers: Record<string, string>, body: BodySource | string = BODY) {
  return requestFromUrl('POST', 'https://api.example.com/echo', headers, body);
}

describe('computeContentDigest', () => {
  it('formats the header value', () => {
    expect(computeContentDigest(BODY)).toBe(`sha-256=:${SHA256}:`);
    expect(computeContentDigest(new TextEncoder().encode(BODY), 'sha-512')).toBe(`sha-512=:${SHA512}:`);
  });
});

describe('verifyContentDigest', () => {
  it('accepts a matching sha-256 digest', async () => {
    const result = await verifyContentDigest(post({ 'content-digest': `sha-256=:${SHA256}:` }));
    expect(result).toEqual({ ok: true, value: undefined });
  });

  it('accepts sha-256 and sha-512 together', async () => {
    const header = `sha-256=:${SHA256}:, sha-512=:${SHA512}:`;
    expect((await verifyContentDigest(post({ 'content-digest': header }))).ok).toBe(true);
  });

  it('accepts a digest given as a string', async () => {
    const result = await verifyContentDigest(post({ 'content-digest': `sha-256=":${SHA256}:"` }));
    expect(result.ok).toBe(true);
  });

  it('rejects a body with one byte changed', async () => {
    const result = await verifyContentDigest(post({ 'content-digest': `sha-256=:${SHA256}:` }, '{"hello":"World"}'));
    expect(result).toEqual({
      ok: false,
      failure: { kind: FailureKinds.DIGEST_MISMATCH, message: "Content digest 'sha-256' does not match body" },
    });
  });

  it('rejects unsupported algorithms', async () => {
    const md5 = createHash('md5').update(BODY).digest('base64');
    const result = await verifyContentDigest(post({ 'content-digest': `md5=:${md5}:` }));
    expect(result).toEqual({
      ok: false,
      failure: { kind: FailureKinds.DIGEST_MISMATCH, message: "Unsupported content digest algorithm 'md5'" },
    });
  });

  it("rejects digests that are neither bytes nor ':base64:' strings", async () => {
    const result = await verifyContentDigest(post({ 'content-digest': 'sha-256=42' }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe(FailureKinds.DIGEST_MISMATCH);
    }
  });

  it('reports an unparseable header as malformed', async () => {
    const result = await verifyContentDigest(post({ 'content-digest': 'sha-256=:abc' }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe(FailureKinds.MALFORMED_HEADER);
    }
  });

  it('does not read the body without a Content-Digest header', async () => {
    const read = vi.fn().mockResolvedValue(new Uint8Array());
    const result = await verifyContentDigest(post({}, { read }));

    expect(result.ok).toBe(true);
    expect(read).not.toHaveBeenCalled();
  });

  it('propagates an aborted body read', async () => {
    const controller = new AbortController();
    controller.abort();
    const request = post({ 'content-digest': `sha-256=:${SHA256}:` }, bufferedBody(BODY));

    await expect(verifyContentDigest(request, controller.signal)).rejects.toThrow();
  });
});

describe('checkDigests', () => {
  it('accepts an empty dictionary', () => {
    const digests = parseDictionary('');
    expect(digests.value && checkDigests(digests.value, new Uint8Array())).toEqual({ ok: true, value: undefined });
  });
});
