/**
 * Failure kinds reported by message signature verification
 */
export const FailureKinds = {
  /** Signature, Signature-Input or Content-Digest missing, unparseable, or labels disagree */
  MALFORMED_HEADER: 'MalformedHeader',
  /** alg missing or not the algorithm of the verification mode */
  UNSUPPORTED_ALGORITHM: 'UnsupportedAlgorithm',
  /** created, expires or nonce required by policy but absent */
  MISSING_METADATA: 'MissingMetadata',
  /** Too old, not yet valid, expired, or expires before created */
  STALE_OR_FUTURE_SIGNATURE: 'StaleOrFutureSignature',
  /** A covered component cannot be resolved against the request */
  UNRESOLVABLE_COMPONENT: 'UnresolvableComponent',
  /** Body digest disagrees with Content-Digest, or the digest algorithm is unsupported */
  DIGEST_MISMATCH: 'DigestMismatch',
  /** Cryptographic verification failed */
  SIGNATURE_MISMATCH: 'SignatureMismatch',
} as const;

export type FailureKind = (typeof FailureKinds)[keyof typeof FailureKinds];

/**
 * 400 when the request cannot be verified, 401 when verification failed
 */
export const FailureHttpStatus: Record<FailureKind, 400 | 401> = {
  [FailureKinds.MALFORMED_HEADER]: 400,
  [FailureKinds.UNSUPPORTED_ALGORITHM]: 400,
  [FailureKinds.MISSING_METADATA]: 400,
  [FailureKinds.STALE_OR_FUTURE_SIGNATURE]: 401,
  [FailureKinds.UNRESOLVABLE_COMPONENT]: 400,
  [FailureKinds.DIGEST_MISMATCH]: 401,
  [FailureKinds.SIGNATURE_MISMATCH]: 401,
};

/**
 * A failed verification step
 */
export interface Failure {
  kind: FailureKind;
  message: string;
}

/**
 * Result of one verification step. Steps return failures as values; only
 * programming errors are thrown.
 */
export type StepResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: Failure };

export function succeed<T>(value: T): StepResult<T> {
  return { ok: true, value };
}

export function fail(kind: FailureKind, message: string): { ok: false; failure: Failure } {
  return { ok: false, failure: { kind, message } };
}
