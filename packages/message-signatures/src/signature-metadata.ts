/**
 * Signature parameter validation (alg, created, expires, keyid, nonce, tag)
 * against a freshness policy. All times are unix seconds.
 */

import { FailureKinds, fail, succeed, type StepResult } from './errors.js';
import type { BareItem, Parameters } from './structured-fields/index.js';

export interface VerificationPolicy {
  requireCreated: boolean;
  requireExpires: boolean;
  requireNonce: boolean;
  /** Oldest accepted `created`, in seconds before now. Unset disables the age check. */
  maximumSignatureAge?: number;
  /** Tolerance applied to every timestamp comparison, in seconds */
  allowedClockSkew: number;
  /**
   * Accept parameters outside alg/created/expires/keyid/nonce/tag.
   * Off by default so unvalidated metadata cannot ride along in a signature.
   */
  allowUnknownParameters: boolean;
}

export const DEFAULT_POLICY: Readonly<VerificationPolicy> = Object.freeze({
  requireCreated: true,
  requireExpires: false,
  requireNonce: false,
  maximumSignatureAge: 300,
  allowedClockSkew: 0,
  allowUnknownParameters: false,
});

/**
 * Build a frozen policy; it is shared by concurrent verifications
 */
export function createPolicy(overrides: Partial<VerificationPolicy> = {}): Readonly<VerificationPolicy> {
  const policy = { ...DEFAULT_POLICY, ...overrides };
  if (policy.allowedClockSkew < 0) {
    throw new RangeError('allowedClockSkew must not be negative');
  }
  if (policy.maximumSignatureAge !== undefined && policy.maximumSignatureAge < 0) {
    throw new RangeError('maximumSignatureAge must not be negative');
  }
  return Object.freeze(policy);
}

/**
 * Typed view of the signature parameters
 */
export interface SignatureParameters {
  alg?: string;
  created?: number;
  expires?: number;
  keyid?: string;
  nonce?: string;
  tag?: string;
}

const PARAMETER_TYPES: Record<keyof SignatureParameters, 'string' | 'integer'> = {
  alg: 'string',
  created: 'integer',
  expires: 'integer',
  keyid: 'string',
  nonce: 'string',
  tag: 'string',
};

function isKnownParameter(name: string): name is keyof SignatureParameters {
  return Object.prototype.hasOwnProperty.call(PARAMETER_TYPES, name);
}

/**
 * Check parameter names and value types
 */
export function extractSignatureParameters(
  params: Parameters,
  allowUnknownParameters = false
): StepResult<SignatureParameters> {
  const result: SignatureParameters = {};

  for (const [name, value] of params) {
    if (!isKnownParameter(name)) {
      if (allowUnknownParameters) {
        continue;
      }
      return fail(FailureKinds.MALFORMED_HEADER, `Unknown signature parameter '${name}'`);
    }

    const expected = PARAMETER_TYPES[name];
    if (value.type !== expected) {
      return fail(
        FailureKinds.MALFORMED_HEADER,
        `Signature parameter '${name}' must be ${expected === 'string' ? 'a string' : 'an integer'}`
      );
    }

    assign(result, name, value);
  }

  return succeed(result);
}

function assign(target: SignatureParameters, name: keyof SignatureParameters, value: BareItem): void {
  switch (name) {
    case 'created':
    case 'expires':
      if (value.type === 'integer') {
        target[name] = value.value;
      }
      break;
    default:
      if (value.type === 'string') {
        target[name] = value.value;
      }
  }
}

/**
 * Validate signature parameters against the algorithm and freshness policy.
 *
 * @param now - Current unix time in seconds
 * @param expectedAlgorithm - The only `alg` value accepted in this verification mode
 */
export function validateMetadata(
  params: Parameters,
  policy: Readonly<VerificationPolicy>,
  now: number,
  expectedAlgorithm: string
): StepResult<SignatureParameters> {
  const extracted = extractSignatureParameters(params, policy.allowUnknownParameters);
  if (!extracted.ok) {
    return extracted;
  }
  const metadata = extracted.value;

  if (metadata.alg === undefined || metadata.alg.toLowerCase() !== expectedAlgorithm) {
    return fail(
      FailureKinds.UNSUPPORTED_ALGORITHM,
      `Unsupported signature algorithm '${metadata.alg ?? '<missing>'}'`
    );
  }

  if (policy.requireCreated && metadata.created === undefined) {
    return fail(FailureKinds.MISSING_METADATA, "Signature missing 'created' parameter");
  }
  if (policy.requireExpires && metadata.expires === undefined) {
    return fail(FailureKinds.MISSING_METADATA, "Signature missing 'expires' parameter");
  }
  if (policy.requireNonce && metadata.nonce === undefined) {
    return fail(FailureKinds.MISSING_METADATA, "Signature missing 'nonce' parameter");
  }

  const freshness = checkTimestamps(metadata, policy, now);
  if (freshness !== undefined) {
    return fail(FailureKinds.STALE_OR_FUTURE_SIGNATURE, freshness);
  }

  return succeed(metadata);
}

/**
 * Returns a description of the first violated timestamp rule, if any
 */
export function checkTimestamps(
  metadata: Pick<SignatureParameters, 'created' | 'expires'>,
  policy: Pick<VerificationPolicy, 'maximumSignatureAge' | 'allowedClockSkew'>,
  now: number
): string | undefined {
  const { created, expires } = metadata;
  const skew = policy.allowedClockSkew;

  if (created !== undefined) {
    if (policy.maximumSignatureAge !== undefined && created < now - policy.maximumSignatureAge - skew) {
      return `Signature created time is too old (created: ${created}, now: ${now})`;
    }
    if (created > now + skew) {
      return `Signature created time is in the future (created: ${created}, now: ${now})`;
    }
  }

  if (expires !== undefined && expires + skew < now) {
    return `Signature has expired (expires: ${expires}, now: ${now})`;
  }

  if (created !== undefined && expires !== undefined && expires < created) {
    return 'Signature expires before it was created';
  }

  return undefined;
}
