export * from './errors.js';
export * from './escape.js';
export * from './flags.js';
export { parseCatalog, isCommentLine } from './parser.js';
export * from './header.js';
export * from './serializer.js';
export * from './document.js';
export * from './json.js';
export * from './jsonRepair.js';
export * from './range.js';
export * from './merge.js';
export * from './filter.js';
export * from './stats.js';
export * from './compare.js';
export type * from '../types/index.js';
