export * from './structured-fields/index.js';
export * from './errors.js';
export * from './logger.js';
export * from './request.js';
export * from './components.js';
export * from './signature-base.js';
export * from './signature-headers.js';
export * from './signature-metadata.js';
export * from './content-digest.js';
export * from './crypto.js';
export * from './verifier.js';
