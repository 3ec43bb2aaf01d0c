export * from './capabilities.js';
export * from './types.js';
