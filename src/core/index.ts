/**
 * Core Module
 *
 * Re-exports the address model, the protocol codec and the scheduling
 * primitives.
 */

export * from './address.js';
export * from './latch.js';
export * from './shared-result.js';
export * from './timeout-retry.js';
export * from './protocol/index.js';
