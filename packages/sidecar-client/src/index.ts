// Sidecar HTTP client with normalized error handling
export * from './client.js';

export * from './errors.js';

export * from './factory.js';

export * from './instrumentation.js';

export * from './types.js';

// Export pure functional core functions
export * from './core/index.js';
