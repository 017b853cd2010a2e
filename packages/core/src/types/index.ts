export * from './entity.js';
export * from './errors.js';
export * from './options.js';
export * from './result.js';
