export { loadConfig } from './config.js';
export { messageSigningMiddleware, keyMaterialFor } from './middleware.js';
export type { MessageSigningOptions } from './middleware.js';
export { toSignedRequest } from './request-adapter.js';
export { tokenBindingMiddleware, verifyTokenBinding, hashBindingValue } from './token-binding.js';
export type { TokenBindingOptions, TokenBindingResult } from './token-binding.js';
export type {
  AdmissionConfig,
  AdmissionHandler,
  AdmissionLocals,
  AdmissionResponse,
  AsyncAdmissionHandler,
  AttestationClaims,
  SigningMode,
} from './types.js';
