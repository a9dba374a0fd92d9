export * from './console.js';
export * from './json.js';
export * from './extensions.js';
