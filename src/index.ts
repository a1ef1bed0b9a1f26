/**
 * PCK Gateway Client
 *
 * Client for PCK bus gateways: login handshake, wire codec, per-module
 * command queues with acknowledge retries, and status request correlation.
 *
 * @packageDocumentation
 */

// Core components
export * from './core/index.js';

// Gateway connection
export * from './connection/index.js';

// Orchestration
export { PckClient } from './client.js';

// Observability
export * from './observability/index.js';

// Configuration
export * from './config/index.js';

// Version
export const VERSION = '0.1.0';
