/**
 * File collection exports.
 */
export { collectCodeFiles, buildIncludePatterns, buildExcludePatterns } from './collector.js';
export { buildFileTree, renderFileTree } from './tree.js';
export type { FileTree } from './tree.js';
