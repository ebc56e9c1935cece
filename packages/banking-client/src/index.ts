export * from './client.js';
export * from './config.js';
export * from './errors.js';
export * from './types.js';

export * from './auth-state.js';
export * from './request-builder.js';
export * from './response-mapper.js';
export * from './transfer-request.js';
