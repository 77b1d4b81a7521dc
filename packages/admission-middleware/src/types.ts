import type { NextFunction, Request, Response } from 'express';
import type { DeviceIdEncoding, VerificationPolicy, VerificationSuccess } from '@attestgate/message-signatures';

export type SigningMode = 'none' | 'installation' | 'account';

/**
 * Claims of the already-validated attestation token, placed on
 * `res.locals.attestation` by the token check that runs first.
 */
export interface AttestationClaims {
  /** Installation public key, base64 SubjectPublicKeyInfo DER */
  ipk?: string;
  /** Device id */
  did?: string;
  /** Token expiry, unix seconds */
  exp?: number;
  /** Token binding: base64 SHA-256 of the bound header values */
  pay?: string;
}

/**
 * What the admission middlewares read from and write to `res.locals`
 */
export interface AdmissionLocals {
  attestation?: AttestationClaims;
  messageSignature?: VerificationSuccess;
  tokenBindingVerified?: boolean;
}

export type AdmissionResponse = Response<unknown, AdmissionLocals>;

export type AdmissionHandler = (req: Request, res: AdmissionResponse, next: NextFunction) => void;

export type AsyncAdmissionHandler = (req: Request, res: AdmissionResponse, next: NextFunction) => Promise<void>;

export interface AdmissionConfig {
  mode: SigningMode;
  /** Decoded ACCOUNT_MESSAGE_BASE_SECRET; set in account mode */
  accountBaseSecret?: Uint8Array;
  policy: Readonly<VerificationPolicy>;
  deviceIdEncoding: DeviceIdEncoding;
  /** Lowercase header names whose values are bound to the token */
  tokenBindingHeaders: string[];
}
