/**
 * PCK Client Orchestrator
 *
 * Loads configuration, opens the gateway connection, runs module discovery
 * and exposes Prometheus metrics for it.
 */

import { createServer, type Server } from 'http';
import type { PckConfig, PckConfigInput } from './config/schema.js';
import { loadConfig } from './config/loader.js';
import { PchkConnectionManager } from './connection/manager.js';
import type { ConnectionEvent } from './connection/types.js';
import { initLogger, createLogger } from './observability/logger.js';
import {
  getMetrics,
  getContentType,
  recordConnectionLoss,
  recordPingTimeout,
  updateBusConnected,
  updateConnectionMetrics,
  updateConnectionReady,
  updateModuleCount,
  updateRequesterMetrics,
} from './observability/metrics.js';

// -----------------------------------------------------------------------------
// Client Class
// -----------------------------------------------------------------------------

export class PckClient {
  private config: PckConfig;
  private logger = createLogger({ component: 'client' });

  private connection: PchkConnectionManager | null = null;
  private metricsServer: Server | null = null;
  private discovery: Promise<void> | null = null;

  private running = false;

  constructor(config?: PckConfigInput) {
    this.config = loadConfig({ overrides: config });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Connect to the gateway. Resolves once the connection is ready; module
   * discovery continues in the background.
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error('Client is already running');
    }

    initLogger({
      level: this.config.logging.level,
      pretty: this.config.logging.pretty || this.config.environment === 'development',
    });
    this.logger = createLogger({ component: 'client' });
    this.logger.info('Starting PCK client...');

    try {
      await this.initConnection();
      await this.initObservability();

      this.running = true;
      this.logger.info('PCK client started');
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to start PCK client');
      await this.stop();
      throw error;
    }
  }

  async stop(): Promise<void> {
    this.logger.info('Stopping PCK client...');

    await this.stopMetricsServer();

    if (this.connection) {
      await this.connection.close();
      this.connection = null;
    }

    if (this.discovery) {
      await this.discovery;
      this.discovery = null;
    }

    this.running = false;
    this.logger.info('PCK client stopped');
  }

  // ---------------------------------------------------------------------------
  // Initialisation
  // ---------------------------------------------------------------------------

  private async initConnection(): Promise<void> {
    const { connectTimeoutMs, ...options } = this.config.connection;

    const connection = new PchkConnectionManager({ ...options, settings: this.config.settings });
    this.connection = connection;
    connection.onEvent((event) => this.handleConnectionEvent(connection, event));

    await connection.connect(connectTimeoutMs);

    this.logger.info(
      {
        host: options.host,
        port: options.port,
        localSegmentId: connection.getLocalSegmentId(),
      },
      'Gateway connection ready'
    );
  }

  private handleConnectionEvent(connection: PchkConnectionManager, event: ConnectionEvent): void {
    const id = this.config.connection.connectionId;

    switch (event.type) {
      case 'state_changed':
        updateConnectionReady(id, event.to === 'ready');
        break;
      case 'bus_connection_status_changed':
        updateBusConnected(id, event.connected);
        if (!event.connected) {
          this.logger.warn('Bus disconnected');
        }
        break;
      case 'connection_lost':
        recordConnectionLoss(id);
        this.logger.error('Connection to gateway lost');
        break;
      case 'ping_timeout':
        recordPingTimeout(id);
        this.logger.warn('Keepalive not answered in time');
        break;
      case 'segment_scan_completed':
        if (this.config.discovery.scanOnConnect) {
          this.startDiscovery(connection);
        }
        break;
      default:
        break;
    }
  }

  private startDiscovery(connection: PchkConnectionManager): void {
    const previous = this.discovery ?? Promise.resolve();
    this.discovery = previous
      .then(() => this.runDiscovery(connection))
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'Module discovery failed');
      });
  }

  private async runDiscovery(connection: PchkConnectionManager): Promise<void> {
    const { numTries, timeoutMs, pollStatus, pollS0Inputs } = this.config.discovery;

    await connection.scanModules(numTries, timeoutMs);
    const modules = connection.getModuleConns();
    this.logger.info({ count: modules.length }, 'Module discovery finished');

    if (pollStatus) {
      await Promise.all(modules.map((conn) => conn.activateStatusRequests(pollS0Inputs)));
    }
  }

  private async initObservability(): Promise<void> {
    if (!this.config.metrics.enabled) {
      return;
    }

    const server = createServer((req, res) => {
      if (req.url !== this.config.metrics.path) {
        res.statusCode = 404;
        res.end('Not found');
        return;
      }

      this.collectMetrics();
      getMetrics()
        .then((metrics) => {
          res.setHeader('Content-Type', getContentType());
          res.end(metrics);
        })
        .catch((error: unknown) => {
          this.logger.error({ err: error }, 'Failed to render metrics');
          res.statusCode = 500;
          res.end();
        });
    });
    this.metricsServer = server;

    await new Promise<void>((resolve) => {
      server.listen(this.config.metrics.port, () => {
        this.logger.info(
          { port: this.config.metrics.port, path: this.config.metrics.path },
          'Metrics endpoint started'
        );
        resolve();
      });
    });
  }

  private collectMetrics(): void {
    const connection = this.connection;
    if (!connection) return;

    const id = this.config.connection.connectionId;
    updateConnectionMetrics(id, connection.getMetrics());
    updateRequesterMetrics(
      id,
      connection.statusRequester.getMetrics(),
      connection.statusRequester.getRequestCount()
    );
    updateModuleCount(id, connection.getModuleConns().length);
  }

  private async stopMetricsServer(): Promise<void> {
    const server = this.metricsServer;
    if (!server) return;

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    this.metricsServer = null;
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  isRunning(): boolean {
    return this.running;
  }

  getConfig(): Readonly<PckConfig> {
    return this.config;
  }

  /**
   * The gateway connection, null when stopped.
   */
  getConnection(): PchkConnectionManager | null {
    return this.connection;
  }

  /**
   * Resolves when the discovery run in progress (if any) has finished.
   */
  async waitForDiscovery(): Promise<void> {
    await this.discovery;
  }
}
