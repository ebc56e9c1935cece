// Pooled HTTP transport with retry and error classification
export * from './client.js';

export * from './types.js';

// Pure functional core
export * from './core/http-utils.js';
export * from './core/types.js';
