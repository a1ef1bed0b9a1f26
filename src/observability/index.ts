/**
 * Observability Module
 *
 * Re-exports logging and metrics components.
 */

export * from './logger.js';
export * from './metrics.js';
