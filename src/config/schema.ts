/**
 * Configuration Schema
 *
 * Zod schema definitions for configuration validation.
 */

import { z } from 'zod';
import { OutputPortDimMode, OutputPortStatusMode } from '../core/protocol/defs.js';
import { DEFAULT_CONNECTION_OPTIONS, DEFAULT_CONNECTION_SETTINGS } from '../connection/types.js';

const defaults = DEFAULT_CONNECTION_SETTINGS;

// -----------------------------------------------------------------------------
// Gateway Connection Config Schema
// -----------------------------------------------------------------------------

export const ConnectionConfigSchema = z.object({
  host: z.string().min(1).default(DEFAULT_CONNECTION_OPTIONS.host),
  port: z.number().int().min(1).max(65535).default(DEFAULT_CONNECTION_OPTIONS.port),
  username: z.string().min(1).default(DEFAULT_CONNECTION_OPTIONS.username),
  password: z.string().default(DEFAULT_CONNECTION_OPTIONS.password),
  connectionId: z.string().min(1).default(DEFAULT_CONNECTION_OPTIONS.connectionId),
  connectTimeoutMs: z.number().int().min(1000).max(300000).default(30000),
});

// -----------------------------------------------------------------------------
// Protocol Settings Config Schema
// -----------------------------------------------------------------------------

export const SettingsConfigSchema = z.object({
  numTries: z.number().int().min(1).max(100).default(defaults.numTries),
  skNumTries: z.number().int().min(1).max(100).default(defaults.skNumTries),
  defaultTimeoutMs: z.number().int().min(1).max(60000).default(defaults.defaultTimeoutMs),
  maxStatusEventBasedValueAgeMs: z.number().int().min(1000).default(defaults.maxStatusEventBasedValueAgeMs),
  maxStatusPolledValueAgeMs: z.number().int().min(1000).default(defaults.maxStatusPolledValueAgeMs),
  statusRequestDelayAfterCommandMs: z.number().int().min(0).default(defaults.statusRequestDelayAfterCommandMs),
  pingSendDelayMs: z.number().int().min(1000).default(defaults.pingSendDelayMs),
  pingRecvTimeoutMs: z.number().int().min(100).default(defaults.pingRecvTimeoutMs),
  busIdleTimeMs: z.number().int().min(0).max(10000).default(defaults.busIdleTimeMs),
  acknowledge: z.boolean().default(defaults.acknowledge),
  dimMode: z.nativeEnum(OutputPortDimMode).default(defaults.dimMode),
  statusMode: z.nativeEnum(OutputPortStatusMode).default(defaults.statusMode),
  maxParallelRequests: z.number().int().min(1).max(1000).default(defaults.maxParallelRequests),
  maxResponseAgeMs: z.number().int().min(1000).default(defaults.maxResponseAgeMs),
});

// -----------------------------------------------------------------------------
// Discovery Config Schema
// -----------------------------------------------------------------------------

export const DiscoveryConfigSchema = z.object({
  scanOnConnect: z.boolean().default(true),
  numTries: z.number().int().min(1).max(20).default(3),
  timeoutMs: z.number().int().min(100).max(60000).default(3000),
  /** Poll every module found by the scan */
  pollStatus: z.boolean().default(false),
  pollS0Inputs: z.boolean().default(false),
});

// -----------------------------------------------------------------------------
// Logging Config Schema
// -----------------------------------------------------------------------------

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  pretty: z.boolean().default(false),
});

// -----------------------------------------------------------------------------
// Metrics Config Schema
// -----------------------------------------------------------------------------

export const MetricsConfigSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().min(1).max(65535).default(9090),
  path: z.string().default('/metrics'),
});

// -----------------------------------------------------------------------------
// Full Configuration Schema
// -----------------------------------------------------------------------------

export const PckConfigSchema = z.object({
  // General
  name: z.string().min(1).default('pck-client'),
  environment: z.enum(['development', 'production', 'test']).default('development'),

  // Gateway
  connection: ConnectionConfigSchema.default({}),
  settings: SettingsConfigSchema.default({}),
  discovery: DiscoveryConfigSchema.default({}),

  // Observability
  logging: LoggingConfigSchema.default({}),
  metrics: MetricsConfigSchema.default({}),
});

/** Section schemas by config key, used to map environment variables. */
export const CONFIG_SECTIONS = {
  connection: ConnectionConfigSchema,
  settings: SettingsConfigSchema,
  discovery: DiscoveryConfigSchema,
  logging: LoggingConfigSchema,
  metrics: MetricsConfigSchema,
} as const;

// -----------------------------------------------------------------------------
// Type Exports
// -----------------------------------------------------------------------------

export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type SettingsConfig = z.infer<typeof SettingsConfigSchema>;
export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;
export type PckConfig = z.infer<typeof PckConfigSchema>;
/** Input accepted before defaults are applied */
export type PckConfigInput = z.input<typeof PckConfigSchema>;
