// Functional core exports

export * from './address.js';
export * from './error-body.js';
export * from './transport-errors.js';
export * from './types.js';
