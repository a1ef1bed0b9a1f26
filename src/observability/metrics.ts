/**
 * Prometheus Metrics
 *
 * Metrics collection and export for monitoring.
 * Exposes Prometheus-compatible metrics endpoint.
 */

import { Registry, Counter, Gauge, collectDefaultMetrics } from 'prom-client';
import type { ConnectionMetrics } from '../connection/types.js';
import type { StatusRequesterMetrics } from '../connection/status-requester.js';

// -----------------------------------------------------------------------------
// Registry
// -----------------------------------------------------------------------------

const registry = new Registry();

// Collect default Node.js metrics (memory, CPU, etc.)
collectDefaultMetrics({ register: registry });

// -----------------------------------------------------------------------------
// Connection Metrics
// -----------------------------------------------------------------------------

export const connectionReadyGauge = new Gauge({
  name: 'pck_connection_ready',
  help: 'Gateway connection ready (1 = ready, 0 = not ready)',
  labelNames: ['connection'] as const,
  registers: [registry],
});

export const busConnectedGauge = new Gauge({
  name: 'pck_bus_connected',
  help: 'Bus reported connected by the gateway (1 = connected, 0 = disconnected)',
  labelNames: ['connection'] as const,
  registers: [registry],
});

export const connectionLossesTotal = new Counter({
  name: 'pck_connection_losses_total',
  help: 'Total unexpected gateway disconnections',
  labelNames: ['connection'] as const,
  registers: [registry],
});

export const pingTimeoutsTotal = new Counter({
  name: 'pck_ping_timeouts_total',
  help: 'Total keepalives without a reply in time',
  labelNames: ['connection'] as const,
  registers: [registry],
});

export const pingLatencyGauge = new Gauge({
  name: 'pck_ping_latency_seconds',
  help: 'Round-trip time of the last answered keepalive in seconds',
  labelNames: ['connection'] as const,
  registers: [registry],
});

// -----------------------------------------------------------------------------
// Line Metrics
// -----------------------------------------------------------------------------

export const linesGauge = new Gauge({
  name: 'pck_lines',
  help: 'Lines exchanged with the gateway since connect, by direction',
  labelNames: ['connection', 'direction'] as const,
  registers: [registry],
});

export const unknownLinesGauge = new Gauge({
  name: 'pck_unknown_lines',
  help: 'Received lines no pattern matched since connect',
  labelNames: ['connection'] as const,
  registers: [registry],
});

export const oversizedLinesGauge = new Gauge({
  name: 'pck_oversized_lines',
  help: 'Partial lines dropped for exceeding the line length limit since connect',
  labelNames: ['connection'] as const,
  registers: [registry],
});

// -----------------------------------------------------------------------------
// Module Metrics
// -----------------------------------------------------------------------------

export const modulesGauge = new Gauge({
  name: 'pck_modules_current',
  help: 'Module connections currently known',
  labelNames: ['connection'] as const,
  registers: [registry],
});

export const statusRequestsGauge = new Gauge({
  name: 'pck_status_requests',
  help: 'Status request outcomes since start, by outcome',
  labelNames: ['connection', 'outcome'] as const,
  registers: [registry],
});

export const pendingStatusRequestsGauge = new Gauge({
  name: 'pck_status_requests_tracked_current',
  help: 'Status requests currently tracked (pending or cached)',
  labelNames: ['connection'] as const,
  registers: [registry],
});

// -----------------------------------------------------------------------------
// Export Functions
// -----------------------------------------------------------------------------

/**
 * Get metrics in Prometheus format.
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

/**
 * Get the registry for custom metrics.
 */
export function getRegistry(): Registry {
  return registry;
}

/**
 * Get content type for Prometheus endpoint.
 */
export function getContentType(): string {
  return registry.contentType;
}

// -----------------------------------------------------------------------------
// Convenience Functions
// -----------------------------------------------------------------------------

export function updateConnectionReady(connection: string, ready: boolean): void {
  connectionReadyGauge.labels(connection).set(ready ? 1 : 0);
}

export function updateBusConnected(connection: string, connected: boolean): void {
  busConnectedGauge.labels(connection).set(connected ? 1 : 0);
}

export function recordConnectionLoss(connection: string): void {
  connectionLossesTotal.labels(connection).inc();
}

export function recordPingTimeout(connection: string): void {
  pingTimeoutsTotal.labels(connection).inc();
}

/**
 * Copy a connection's own counters into the registry.
 */
export function updateConnectionMetrics(connection: string, metrics: Readonly<ConnectionMetrics>): void {
  linesGauge.labels(connection, 'received').set(metrics.linesReceived);
  linesGauge.labels(connection, 'sent').set(metrics.linesSent);
  unknownLinesGauge.labels(connection).set(metrics.unknownLines);
  oversizedLinesGauge.labels(connection).set(metrics.oversizedLines);
  if (metrics.lastPingLatencyMs !== null) {
    pingLatencyGauge.labels(connection).set(metrics.lastPingLatencyMs / 1000);
  }
}

export function updateRequesterMetrics(
  connection: string,
  metrics: Readonly<StatusRequesterMetrics>,
  tracked: number
): void {
  statusRequestsGauge.labels(connection, 'sent').set(metrics.requestsSent);
  statusRequestsGauge.labels(connection, 'cache_hit').set(metrics.cacheHits);
  statusRequestsGauge.labels(connection, 'answered').set(metrics.responses);
  statusRequestsGauge.labels(connection, 'failed').set(metrics.failures);
  pendingStatusRequestsGauge.labels(connection).set(tracked);
}

export function updateModuleCount(connection: string, count: number): void {
  modulesGauge.labels(connection).set(count);
}
