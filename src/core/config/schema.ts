/**
 * Configuration schema for gazecast.
 * Zod-validated configuration with sensible defaults.
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';

// ============================================================================
// Sub-schemas
// ============================================================================

const ReconnectConfigSchema = z.object({
  enabled: z.boolean().default(true),
  maxAttempts: z.number().int().min(0).default(0), // 0 = infinite
  initialDelayMs: z.number().int().positive().default(500),
  maxDelayMs: z.number().int().positive().default(10000),
  /** Upper bound of the random jitter added to each delay */
  jitterMs: z.number().int().min(0).default(250),
});

const DiscoveryConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(10000),
  serviceType: z.string().min(1).default('http'),
  /**
   * Accepted advertisement name prefixes.
   * Empty accepts every name shaped like "<prefix>:<name>:<id>".
   */
  namePrefixes: z.array(z.string().min(1)).default([]),
});

const ControlConfigSchema = z.object({
  connectTimeoutMs: z.number().int().positive().default(5000),
  commandTimeoutMs: z.number().int().positive().default(10000),
  /** How long stop-and-save waits for the device to report idle */
  stopAndSaveTimeoutMs: z.number().int().positive().default(30000),
  reconnect: ReconnectConfigSchema.default({}),
});

const StreamsConfigSchema = z.object({
  bufferCapacity: z.number().int().positive().default(64),
  dropPolicy: z.enum(['drop-oldest', 'drop-newest']).default('drop-oldest'),
  maxConsecutiveDecodeErrors: z.number().int().positive().default(25),
  connectTimeoutMs: z.number().int().positive().default(5000),
  keepAliveIntervalMs: z.number().int().positive().default(20000),
  reconnect: ReconnectConfigSchema.default({}),
});

const ClockConfigSchema = z.object({
  enabled: z.boolean().default(true),
  intervalMs: z.number().int().positive().default(10000),
  /** EWMA weight given to each new sample */
  smoothing: z.number().gt(0).max(1).default(0.2),
  /** Assumed device-side turnaround time of one probe */
  processingTimeMs: z.number().min(0).default(0),
  maxRoundTripMs: z.number().positive().default(250),
  rttVarianceThresholdMs: z.number().positive().default(50),
  driftThresholdMs: z.number().positive().default(20),
  burstSize: z.number().int().positive().default(8),
  probeTimeoutMs: z.number().int().positive().default(1000),
});

const FacadeConfigSchema = z.object({
  queueCapacity: z.number().int().positive().default(1),
  callTimeoutMs: z.number().int().positive().default(15000),
  closeGraceMs: z.number().int().positive().default(3000),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  prettyPrint: z.boolean().default(false),
});

// ============================================================================
// Main Configuration Schema
// ============================================================================

export const ConfigSchema = z.object({
  discovery: DiscoveryConfigSchema.default({}),
  control: ControlConfigSchema.default({}),
  streams: StreamsConfigSchema.default({}),
  clock: ClockConfigSchema.default({}),
  facade: FacadeConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// ============================================================================
// Type Exports
// ============================================================================

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type ReconnectConfig = z.infer<typeof ReconnectConfigSchema>;
export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;
export type ControlConfig = z.infer<typeof ControlConfigSchema>;
export type StreamsConfig = z.infer<typeof StreamsConfigSchema>;
export type ClockConfig = z.infer<typeof ClockConfigSchema>;
export type FacadeConfig = z.infer<typeof FacadeConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type DropPolicy = StreamsConfig['dropPolicy'];

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate and parse configuration.
 * Throws ConfigError listing every issue.
 */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Validate configuration without throwing.
 * Returns result object with success flag.
 */
export function safeParseConfig(raw: unknown): z.SafeParseReturnType<ConfigInput, Config> {
  return ConfigSchema.safeParse(raw ?? {});
}

/**
 * Configuration with every default applied.
 */
export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}
