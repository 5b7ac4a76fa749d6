/**
 * Main entry point for casper-deploy-client
 *
 * Build, hash, sign and verify deploys offline. Submitting the result is left
 * to the caller's RPC client: `deployToJson` produces the request payload.
 */

// Errors
export * from './errors.js';

// Branded types and guards
export * from './types.js';

// Typed values
export * from './bytesrepr.js';
export * from './cl-type.js';
export * from './cl-value.js';

// Deploy construction
export * from './executable.js';
export * from './deploy.js';
export * from './cep78.js';

// Signing and verification
export * from './crypto/index.js';
export * from './approvals.js';
export * from './validation.js';

// JSON-RPC rendering
export * from './json.js';
export * from './parsers.js';
