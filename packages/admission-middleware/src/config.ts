import { z } from 'zod';
import { createPolicy, decodeBase64 } from '@attestgate/message-signatures';
import type { AdmissionConfig } from './types.js';

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const seconds = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .optional()
    .transform((value) => (value === undefined ? fallback : parseInt(value, 10)));

// "none" or 0 lifts the age limit
const maxAge = (fallback: number) =>
  z
    .string()
    .regex(/^(\d+|none)$/, 'must be a non-negative integer or "none"')
    .optional()
    .transform((value) => {
      if (value === undefined) {
        return fallback;
      }
      const age = value === 'none' ? 0 : parseInt(value, 10);
      return age === 0 ? undefined : age;
    });

const envSchema = z.object({
  MESSAGE_SIGNING_MODE: z.enum(['none', 'installation', 'account']).default('none'),
  ACCOUNT_MESSAGE_BASE_SECRET: z.string().optional(),
  MESSAGE_SIGNING_MAX_AGE_SEC: maxAge(300),
  MESSAGE_SIGNING_CLOCK_SKEW_SEC: seconds(0),
  MESSAGE_SIGNING_REQUIRE_CREATED: flag(true),
  MESSAGE_SIGNING_REQUIRE_EXPIRES: flag(false),
  MESSAGE_SIGNING_REQUIRE_NONCE: flag(false),
  DEVICE_ID_ENCODING: z.enum(['base64', 'utf8']).default('base64'),
  TOKEN_BINDING_HEADERS: z.string().default(''),
});

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AdmissionConfig {
  // Unset and empty variables both take the default
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join('.') ?? 'configuration';
    throw new Error(`Invalid ${name}: ${issue?.message ?? 'unknown error'}`);
  }
  const vars = parsed.data;

  let accountBaseSecret: Uint8Array | undefined;
  if (vars.MESSAGE_SIGNING_MODE === 'account') {
    accountBaseSecret = decodeBase64(vars.ACCOUNT_MESSAGE_BASE_SECRET ?? '');
    if (!accountBaseSecret) {
      throw new Error('Invalid ACCOUNT_MESSAGE_BASE_SECRET: account mode requires a base64 secret');
    }
  }

  return {
    mode: vars.MESSAGE_SIGNING_MODE,
    accountBaseSecret,
    policy: createPolicy({
      maximumSignatureAge: vars.MESSAGE_SIGNING_MAX_AGE_SEC,
      allowedClockSkew: vars.MESSAGE_SIGNING_CLOCK_SKEW_SEC,
      requireCreated: vars.MESSAGE_SIGNING_REQUIRE_CREATED,
      requireExpires: vars.MESSAGE_SIGNING_REQUIRE_EXPIRES,
      requireNonce: vars.MESSAGE_SIGNING_REQUIRE_NONCE,
    }),
    deviceIdEncoding: vars.DEVICE_ID_ENCODING,
    tokenBindingHeaders: vars.TOKEN_BINDING_HEADERS.split(',')
      .map((header) => header.trim().toLowerCase())
      .filter(Boolean),
  };
}
