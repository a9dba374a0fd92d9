/**
 * Project analysis: language registry, analyzers, statistics and reporters
 */

export * from './languages/registry.js';
export * from './analyzers/index.js';
export * from './models/file-statistics.js';
export * from './models/directory-statistics.js';
export * from './scanners/filesystem.js';
export * from './reporters/index.js';
export * from './utils/tree.js';
export * from './utils/format.js';
