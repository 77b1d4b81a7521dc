import type { Request, NextFunction } from 'express';
import {
  MessageSignatureVerifier,
  consoleLogger,
  type KeyMaterial,
  type Logger,
} from '@attestgate/message-signatures';
import { toSignedRequest } from './request-adapter.js';
import type { AdmissionConfig, AsyncAdmissionHandler, AttestationClaims, AdmissionResponse } from './types.js';

export interface MessageSigningOptions {
  config: AdmissionConfig;
  logger?: Logger;
  /** Defaults to a verifier built from `config.policy` */
  verifier?: MessageSignatureVerifier;
  /** Unix seconds; defaults to the system clock */
  clock?: () => number;
}

/**
 * Express middleware for message signature verification.
 *
 * Runs after the attestation token check, which leaves the token claims on
 * `res.locals.attestation`. Requests without key material for the configured
 * mode pass through untouched. A failed verification ends the request with
 * 400 or 401 and the body `Invalid Token`; the reason is only logged.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * app.use(attestationTokenCheck);
 * app.use(express.raw({ type: '*\/*' }));
 * app.use(messageSigningMiddleware({ config }));
 *
 * app.post('/transfer', (req, res) => {
 *   res.json({ signedBy: res.locals.messageSignature?.parameters.keyid });
 * });
 * ```
 */
export function messageSigningMiddleware(options: MessageSigningOptions): AsyncAdmissionHandler {
  const { config, logger = consoleLogger, clock } = options;
  const verifier = options.verifier ?? new MessageSignatureVerifier({ policy: config.policy, logger });

  return async (req: Request, res: AdmissionResponse, next: NextFunction): Promise<void> => {
    const keyMaterial = keyMaterialFor(config, res.locals.attestation);
    if (!keyMaterial) {
      next();
      return;
    }

    const abort = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) {
        abort.abort(new Error('Client disconnected'));
      }
    };
    req.once('close', onClose);

    try {
      const result = await verifier.verify(toSignedRequest(req), keyMaterial, {
        now: clock?.(),
        signal: abort.signal,
      });

      if (!result.verified) {
        logger.info(`Message signature verification failed: ${result.failure}: ${result.error}`);
        res.status(result.httpStatus).type('text/plain').send('Invalid Token');
        return;
      }

      logger.debug(`Message signature verified for label '${result.label}'`);
      res.locals.messageSignature = result;
      next();
    } catch (error) {
      next(error);
    } finally {
      req.off('close', onClose);
    }
  };
}

/**
 * Key material for the configured mode, or undefined when the token does not
 * carry what that mode needs
 */
export function keyMaterialFor(config: AdmissionConfig, claims: AttestationClaims | undefined): KeyMaterial | undefined {
  switch (config.mode) {
    case 'none':
      return undefined;
    case 'installation':
      return claims?.ipk ? { mode: 'installation', publicKey: claims.ipk } : undefined;
    case 'account':
      if (!config.accountBaseSecret || !claims?.did || claims.exp === undefined) {
        return undefined;
      }
      return {
        mode: 'account',
        baseSecret: config.accountBaseSecret,
        deviceId: claims.did,
        tokenExpiry: claims.exp,
        deviceIdEncoding: config.deviceIdEncoding,
      };
  }
}
