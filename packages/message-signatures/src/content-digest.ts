/**
 * Content-Digest verification (RFC 9530)
 *
 *   Content-Digest: sha-256=:X48E9qOokqqrvdts8nOJRJN3OWDUoyWxBf7kbu9DBPE=:
 */

import { createHash } from 'node:crypto';
import { timingSafeEqualBytes } from './crypto.js';
import { FailureKinds, fail, succeed, type StepResult } from './errors.js';
import type { SignedRequest } from './request.js';
import { readDictionaryHeader } from './signature-headers.js';
import type { StructuredDictionary, StructuredItem } from './structured-fields/index.js';

export const DIGEST_ALGORITHMS = {
  'sha-256': 'sha256',
  'sha-512': 'sha512',
} as const;

export type DigestAlgorithm = keyof typeof DIGEST_ALGORITHMS;

function isDigestAlgorithm(name: string): name is DigestAlgorithm {
  return Object.prototype.hasOwnProperty.call(DIGEST_ALGORITHMS, name);
}

export function digestBody(body: Uint8Array, algorithm: DigestAlgorithm): Uint8Array {
  return new Uint8Array(createHash(DIGEST_ALGORITHMS[algorithm]).update(body).digest());
}

/**
 * Header value for a body, e.g. `sha-256=:...:`
 */
export function computeContentDigest(body: Uint8Array | string, algorithm: DigestAlgorithm = 'sha-256'): string {
  const bytes = typeof body === 'string' ? new TextEncoder().encode(body) : body;
  return `${algorithm}=:${Buffer.from(digestBody(bytes, algorithm)).toString('base64')}:`;
}

/**
 * Verify the request body against its Content-Digest header.
 * A request without the header passes and its body is not read.
 */
export async function verifyContentDigest(request: SignedRequest, signal?: AbortSignal): Promise<StepResult<void>> {
  const header = readDictionaryHeader(request.headers, 'content-digest');
  if (header === undefined) {
    return succeed(undefined);
  }
  if (!header.ok) {
    return header;
  }

  const body = await request.body.read(signal);
  return checkDigests(header.value, body);
}

/**
 * Compare every declared digest against the body
 */
export function checkDigests(digests: StructuredDictionary, body: Uint8Array): StepResult<void> {
  for (const [algorithm, item] of digests) {
    if (!isDigestAlgorithm(algorithm)) {
      return fail(FailureKinds.DIGEST_MISMATCH, `Unsupported content digest algorithm '${algorithm}'`);
    }

    const declared = declaredDigest(item);
    if (declared === undefined) {
      return fail(FailureKinds.DIGEST_MISMATCH, `Content digest '${algorithm}' is not a byte sequence`);
    }

    if (!timingSafeEqualBytes(digestBody(body, algorithm), declared)) {
      return fail(FailureKinds.DIGEST_MISMATCH, `Content digest '${algorithm}' does not match body`);
    }
  }

  return succeed(undefined);
}

/**
 * Byte sequence, or a string that holds one in `:base64:` form
 */
function declaredDigest(item: StructuredItem): Uint8Array | undefined {
  if (item.value.type === 'byte-sequence') {
    return item.value.value;
  }
  if (item.value.type === 'string') {
    const match = /^:([A-Za-z0-9+/]*={0,2}):$/.exec(item.value.value);
    if (match) {
      return new Uint8Array(Buffer.from(match[1] ?? '', 'base64'));
    }
  }
  return undefined;
}
