// Main export file - re-exports all public APIs

export { IdentityClient, type IdentityClientOptions } from './identity-client.js';

// Protocol layer
export * from './core/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './utils/errors.js';
