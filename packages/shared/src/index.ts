export * from './types.js';
export * from './types/spatial.js';
export * from './constants.js';
export * from './utils.js';
