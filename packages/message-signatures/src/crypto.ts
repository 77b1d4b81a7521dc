/**
 * Signature primitives for the two verification modes.
 *
 * Installation mode: ECDSA P-256 over SHA-256, public key as base64
 * SubjectPublicKeyInfo DER, signature in IEEE P1363 (r || s) form.
 *
 * Account mode: HMAC-SHA256 with a per-device key derived from the account
 * base secret, the device id and the attestation token expiry.
 */

import { createHmac, timingSafeEqual, webcrypto } from 'node:crypto';
import { consoleLogger, type Logger } from './logger.js';

export type DeviceIdEncoding = 'base64' | 'utf8';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Verify an ECDSA P-256 signature. Import and verification errors yield false.
 */
export async function verifyEcdsaP256Signature(
  publicKeyBase64: string,
  payload: Uint8Array,
  signature: Uint8Array,
  logger: Logger = consoleLogger
): Promise<boolean> {
  try {
    const publicKey = await webcrypto.subtle.importKey(
      'spki',
      Buffer.from(publicKeyBase64, 'base64'),
      { name: 'ECDSA', namedCurve: 'P-256' },
      false,
      ['verify']
    );

    return await webcrypto.subtle.verify(
      { name: 'ECDSA', hash: 'SHA-256' },
      publicKey,
      signature,
      payload
    );
  } catch (error) {
    logger.debug('ECDSA verification error:', error);
    return false;
  }
}

/**
 * Strict base64 decoding; undefined for empty or malformed text
 */
export function decodeBase64(text: string): Uint8Array | undefined {
  if (text.length === 0 || !BASE64_PATTERN.test(text)) {
    return undefined;
  }
  return new Uint8Array(Buffer.from(text, 'base64'));
}

/**
 * Decode a device id. Returns undefined for text that is not valid base64.
 */
export function decodeDeviceId(deviceId: string, encoding: DeviceIdEncoding = 'base64'): Uint8Array | undefined {
  if (encoding === 'utf8') {
    return new Uint8Array(Buffer.from(deviceId, 'utf8'));
  }
  return decodeBase64(deviceId);
}

/**
 * HMAC-SHA256(baseSecret, deviceIdBytes || int64be(tokenExpiry))
 *
 * @param tokenExpiry - Attestation token expiry in unix seconds
 */
export function deriveAccountSecret(baseSecret: Uint8Array, deviceIdBytes: Uint8Array, tokenExpiry: number): Uint8Array {
  if (!Number.isSafeInteger(tokenExpiry)) {
    throw new RangeError(`Token expiry must be an integer, got ${tokenExpiry}`);
  }

  const expiry = Buffer.alloc(8);
  expiry.writeBigInt64BE(BigInt(tokenExpiry));

  return new Uint8Array(createHmac('sha256', baseSecret).update(deviceIdBytes).update(expiry).digest());
}

export function computeHmacSignature(secret: Uint8Array, payload: Uint8Array): Uint8Array {
  return new Uint8Array(createHmac('sha256', secret).update(payload).digest());
}

/**
 * Recompute HMAC-SHA256(secret, payload) and compare in constant time
 */
export function verifyHmacSignature(secret: Uint8Array, payload: Uint8Array, signature: Uint8Array): boolean {
  return timingSafeEqualBytes(computeHmacSignature(secret, payload), signature);
}

/**
 * Constant-time comparison; unequal lengths compare false
 */
export function timingSafeEqualBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}
