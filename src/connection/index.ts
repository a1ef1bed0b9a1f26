/**
 * Connection Module
 *
 * Gateway connection, device connections, status requests and the
 * in-process gateway simulator.
 */

export * from './types.js';
export * from './errors.js';
export * from './status-requester.js';
export * from './status-polling.js';
export * from './device.js';
export * from './manager.js';
export * from './simulator.js';
