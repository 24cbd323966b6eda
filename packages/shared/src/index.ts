export * from './constants/index.js';
export * from './types/index.js';
export * from './validation/index.js';
