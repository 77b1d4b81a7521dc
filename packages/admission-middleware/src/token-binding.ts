/**
 * Token binding: the attestation token's `pay` claim holds the base64 SHA-256
 * of the values of one or more request headers (e.g. Authorization), which
 * ties the token to the session it was issued for.
 */

import { createHash } from 'node:crypto';
import type { Request, NextFunction } from 'express';
import {
  combineHeaderValues,
  consoleLogger,
  getHeaderValues,
  timingSafeEqualBytes,
  type HeaderMap,
  type Logger,
} from '@attestgate/message-signatures';
import type { AdmissionHandler, AdmissionResponse } from './types.js';

export type TokenBindingResult =
  | { status: 'skipped' }
  | { status: 'verified' }
  | { status: 'missing-headers'; headers: string[] }
  | { status: 'mismatch' };

export function hashBindingValue(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('base64');
}

/**
 * Check the `pay` claim against the named headers.
 * Values are trimmed and concatenated in the configured order.
 */
export function verifyTokenBinding(
  headers: HeaderMap,
  headerNames: string[],
  claim: string | undefined
): TokenBindingResult {
  if (!claim || claim.trim() === '' || headerNames.length === 0) {
    return { status: 'skipped' };
  }

  let bound = '';
  const missing: string[] = [];

  for (const name of headerNames) {
    const values = getHeaderValues(headers, name);
    const value = values === undefined ? '' : combineHeaderValues(values, ',');
    if (value === '') {
      missing.push(name);
      continue;
    }
    bound += value;
  }

  if (missing.length > 0) {
    return { status: 'missing-headers', headers: missing };
  }

  const expected = new TextEncoder().encode(hashBindingValue(bound));
  const actual = new TextEncoder().encode(claim);
  return timingSafeEqualBytes(expected, actual) ? { status: 'verified' } : { status: 'mismatch' };
}

export interface TokenBindingOptions {
  /** Header names bound into the `pay` claim */
  headers: string[];
  logger?: Logger;
}

/**
 * Express middleware enforcing the token binding of `res.locals.attestation.pay`
 */
export function tokenBindingMiddleware(options: TokenBindingOptions): AdmissionHandler {
  const { headers, logger = consoleLogger } = options;

  return (req: Request, res: AdmissionResponse, next: NextFunction): void => {
    const result = verifyTokenBinding(req.headers, headers, res.locals.attestation?.pay);

    switch (result.status) {
      case 'skipped':
        logger.debug('Token binding: skipped, no pay claim or no bound headers');
        next();
        return;
      case 'missing-headers':
        logger.info(`Token binding: required header(s) '${result.headers.join(', ')}' missing or empty`);
        res.status(400).type('text/plain').send('Invalid Token');
        return;
      case 'mismatch':
        logger.info('Token binding: pay claim does not match the bound headers');
        res.status(401).type('text/plain').send('Invalid Token');
        return;
      case 'verified':
        res.locals.tokenBindingVerified = true;
        next();
        return;
    }
  };
}
