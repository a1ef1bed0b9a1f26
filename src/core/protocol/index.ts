/**
 * PCK Protocol Module
 *
 * Re-exports definitions, input types and the wire codec.
 */

export * from './defs.js';
export * from './inputs.js';
export * as PckParser from './parser.js';
export * as PckGenerator from './generator.js';
export type { PckCommand } from './generator.js';
