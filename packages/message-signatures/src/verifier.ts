/**
 * HTTP message signature verifier
 *
 * Verifies the signature of one label on a request, in either installation
 * mode (ECDSA P-256 with the device's installation public key) or account
 * mode (HMAC-SHA256 with a key derived per device and token).
 */

import { verifyContentDigest } from './content-digest.js';
import {
  decodeDeviceId,
  deriveAccountSecret,
  verifyEcdsaP256Signature,
  verifyHmacSignature,
  type DeviceIdEncoding,
} from './crypto.js';
import { FailureHttpStatus, FailureKinds, type Failure, type FailureKind } from './errors.js';
import { consoleLogger, type Logger } from './logger.js';
import type { SignedRequest } from './request.js';
import { buildSignatureBase, signatureBaseToBytes } from './signature-base.js';
import { parseSignatureHeaders } from './signature-headers.js';
import {
  DEFAULT_POLICY,
  validateMetadata,
  type SignatureParameters,
  type VerificationPolicy,
} from './signature-metadata.js';

export type VerificationMode = 'installation' | 'account';

export interface InstallationKeyMaterial {
  mode: 'installation';
  /** Base64 SubjectPublicKeyInfo DER of the installation key */
  publicKey: string;
}

export interface AccountKeyMaterial {
  mode: 'account';
  baseSecret: Uint8Array;
  deviceId: string;
  /** Attestation token expiry, unix seconds */
  tokenExpiry: number;
  deviceIdEncoding?: DeviceIdEncoding;
}

export type KeyMaterial = InstallationKeyMaterial | AccountKeyMaterial;

export const SIGNATURE_ALGORITHMS: Record<VerificationMode, string> = {
  installation: 'ecdsa-p256-sha256',
  account: 'hmac-sha256',
};

export const DEFAULT_LABELS: Record<VerificationMode, string> = {
  installation: 'install',
  account: 'account',
};

export interface VerificationSuccess {
  verified: true;
  label: string;
  canonicalMessage: string;
  parameters: SignatureParameters;
}

export interface VerificationFailure {
  verified: false;
  failure: FailureKind;
  /** Internal reason; log it, never send it to the client */
  error: string;
  httpStatus: 400 | 401;
  canonicalMessage?: string;
}

export type VerificationResult = VerificationSuccess | VerificationFailure;

export interface MessageSignatureVerifierOptions {
  policy?: Readonly<VerificationPolicy>;
  logger?: Logger;
  labels?: Partial<Record<VerificationMode, string>>;
  /** Receives the canonical message of every verification that got that far */
  onCanonicalMessage?: (label: string, canonicalMessage: string) => void;
}

export interface VerifyOptions {
  /** Current unix time in seconds; defaults to the system clock */
  now?: number;
  signal?: AbortSignal;
}

export class MessageSignatureVerifier {
  private readonly policy: Readonly<VerificationPolicy>;
  private readonly logger: Logger;
  private readonly labels: Record<VerificationMode, string>;
  private readonly onCanonicalMessage?: (label: string, canonicalMessage: string) => void;

  constructor(options: MessageSignatureVerifierOptions = {}) {
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.logger = options.logger ?? consoleLogger;
    this.labels = { ...DEFAULT_LABELS, ...options.labels };
    this.onCanonicalMessage = options.onCanonicalMessage;
  }

  labelFor(mode: VerificationMode): string {
    return this.labels[mode];
  }

  /**
   * Verify the request's signature for the label of the key material's mode.
   * Never throws; every failure is returned as a result.
   */
  async verify(request: SignedRequest, keyMaterial: KeyMaterial, options: VerifyOptions = {}): Promise<VerificationResult> {
    const label = this.labels[keyMaterial.mode];
    const now = options.now ?? Math.floor(Date.now() / 1000);

    // 1. Signature and Signature-Input for our label
    const parsed = parseSignatureHeaders(request.headers, label);
    if (!parsed.ok) {
      return this.reject(parsed.failure);
    }
    const { signature, input } = parsed.value;

    // 2. alg, created/expires/nonce and freshness
    const metadata = validateMetadata(input.params, this.policy, now, SIGNATURE_ALGORITHMS[keyMaterial.mode]);
    if (!metadata.ok) {
      return this.reject(metadata.failure);
    }

    // 3. Canonical message
    const base = buildSignatureBase(request, input.components, input.params);
    if (!base.ok) {
      return this.reject(base.failure);
    }
    const canonicalMessage = base.value;
    this.traceCanonicalMessage(label, canonicalMessage);

    // 4. Body digest
    try {
      const digest = await verifyContentDigest(request, options.signal);
      if (!digest.ok) {
        return this.reject(digest.failure, canonicalMessage);
      }
    } catch (error) {
      return this.reject(
        { kind: FailureKinds.DIGEST_MISMATCH, message: `Failed to read request body: ${describe(error)}` },
        canonicalMessage
      );
    }

    // 5. Signature bytes
    const payload = signatureBaseToBytes(canonicalMessage);
    const mismatch = await this.checkSignature(keyMaterial, payload, signature.signature);
    if (mismatch !== undefined) {
      return this.reject({ kind: FailureKinds.SIGNATURE_MISMATCH, message: mismatch }, canonicalMessage);
    }

    return {
      verified: true,
      label,
      canonicalMessage,
      parameters: metadata.value,
    };
  }

  /**
   * Returns the reason the signature does not verify, if it does not
   */
  private async checkSignature(
    keyMaterial: KeyMaterial,
    payload: Uint8Array,
    signature: Uint8Array
  ): Promise<string | undefined> {
    if (keyMaterial.mode === 'installation') {
      const valid = await verifyEcdsaP256Signature(keyMaterial.publicKey, payload, signature, this.logger);
      return valid ? undefined : 'Installation signature verification failed';
    }

    const deviceId = decodeDeviceId(keyMaterial.deviceId, keyMaterial.deviceIdEncoding);
    if (deviceId === undefined) {
      return 'Device id is not valid base64';
    }

    try {
      const secret = deriveAccountSecret(keyMaterial.baseSecret, deviceId, keyMaterial.tokenExpiry);
      return verifyHmacSignature(secret, payload, signature) ? undefined : 'Account signature verification failed';
    } catch (error) {
      return `Account signature verification error: ${describe(error)}`;
    }
  }

  private traceCanonicalMessage(label: string, canonicalMessage: string): void {
    if (!this.onCanonicalMessage) {
      return;
    }
    try {
      this.onCanonicalMessage(label, canonicalMessage);
    } catch (error) {
      this.logger.warn(`Canonical message hook failed: ${describe(error)}`);
    }
  }

  private reject(failure: Failure, canonicalMessage?: string): VerificationFailure {
    this.logger.debug(`Message signature rejected (${failure.kind}): ${failure.message}`);
    const result: VerificationFailure = {
      verified: false,
      failure: failure.kind,
      error: failure.message,
      httpStatus: FailureHttpStatus[failure.kind],
    };
    if (canonicalMessage !== undefined) {
      result.canonicalMessage = canonicalMessage;
    }
    return result;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
