/**
 * Configuration Schema
 *
 * Zod schema definitions for configuration validation.
 */

import { z } from 'zod';
import { isValidJsonPath } from '../core/extract/jsonpath.js';
import { TRANSFORM_MODES } from '../core/types.js';

// -----------------------------------------------------------------------------
// Upstream Config Schema
// -----------------------------------------------------------------------------

export const ReconnectConfigSchema = z
  .object({
    initialDelay: z.number().int().min(1).default(2000),
    maxDelay: z.number().int().min(1).default(60000),
  })
  .refine((r) => r.maxDelay >= r.initialDelay, {
    message: 'maxDelay must not be lower than initialDelay',
    path: ['maxDelay'],
  });

export const UpstreamConfigSchema = z.object({
  url: z.string().min(1),
  headers: z.record(z.coerce.string()).default({}),
  handshakeTimeout: z.number().int().min(100).max(120000).default(10000),
  heartbeatInterval: z.number().int().min(0).default(20000),
  heartbeatTimeout: z.number().int().min(1).default(20000),
  reconnect: ReconnectConfigSchema.default({}),
});

// -----------------------------------------------------------------------------
// MQTT Config Schema
// -----------------------------------------------------------------------------

export const MqttConfigSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535).default(1883),
  protocol: z.enum(['mqtt', 'mqtts', 'ws', 'wss']).default('mqtt'),
  username: z.coerce.string().optional(),
  password: z.coerce.string().optional(),
  clientIdPrefix: z.string().min(1).default('ws-mqtt-bridge'),
  keepalive: z.number().int().min(0).max(65535).default(60),
  reconnectPeriod: z.number().int().min(0).default(5000),
  discoveryPrefix: z.string().min(1).default('homeassistant'),
});

// -----------------------------------------------------------------------------
// Device & Mapping Schemas
// -----------------------------------------------------------------------------

export const DeviceConfigSchema = z.object({
  id: z.coerce.string().min(1),
  name: z.string().min(1),
  manufacturer: z.string().min(1).default('Creality'),
  model: z.string().min(1).default('K1/K1 Max (WS Bridge)'),
});

export const FieldMappingSchema = z.object({
  uniqueId: z.string().min(1),
  name: z.string().min(1),
  path: z.string().min(1).refine(isValidJsonPath, { message: 'Invalid JSON path expression' }),
  transform: z.enum(TRANSFORM_MODES).default('none'),
  unit: z.string().optional(),
  icon: z.string().optional(),
  deviceClass: z.string().optional(),
  stateClass: z.string().optional(),
});

export const MappingsSchema = z.array(FieldMappingSchema).superRefine((mappings, ctx) => {
  const seen = new Set<string>();

  mappings.forEach((mapping, index) => {
    if (seen.has(mapping.uniqueId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate uniqueId '${mapping.uniqueId}'`,
        path: [index, 'uniqueId'],
      });
    }
    seen.add(mapping.uniqueId);
  });
});

// -----------------------------------------------------------------------------
// Debug Config Schema
// -----------------------------------------------------------------------------

export const DebugConfigSchema = z.object({
  logRawFrames: z.boolean().default(false),
  rawFramesLimit: z.number().int().min(0).default(0),
});

// -----------------------------------------------------------------------------
// Logging Config Schema
// -----------------------------------------------------------------------------

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().default(true),
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
// Health Config Schema
// -----------------------------------------------------------------------------

export const HealthConfigSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().min(1).max(65535).default(9091),
  checkInterval: z.number().int().min(5000).max(300000).default(30000),
});

// -----------------------------------------------------------------------------
// Full Configuration Schema
// -----------------------------------------------------------------------------

export const BridgeConfigSchema = z.object({
  // General
  name: z.string().min(1).default('ws-mqtt-bridge'),
  environment: z.enum(['development', 'production', 'test']).default('production'),

  // Pipeline
  upstream: UpstreamConfigSchema,
  mqtt: MqttConfigSchema.default({}),
  baseTopic: z.string().min(1).default('ws_bridge'),
  device: DeviceConfigSchema,
  mappings: MappingsSchema.default([]),
  debug: DebugConfigSchema.default({}),

  // Observability
  logging: LoggingConfigSchema.default({}),
  metrics: MetricsConfigSchema.default({}),
  health: HealthConfigSchema.default({}),
});

// -----------------------------------------------------------------------------
// Type Exports
// -----------------------------------------------------------------------------

export type UpstreamConfigInput = z.input<typeof UpstreamConfigSchema>;
export type MqttConfig = z.infer<typeof MqttConfigSchema>;
export type DeviceConfig = z.infer<typeof DeviceConfigSchema>;
export type FieldMappingConfig = z.infer<typeof FieldMappingSchema>;
export type DebugConfig = z.infer<typeof DebugConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;
export type HealthConfig = z.infer<typeof HealthConfigSchema>;
export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type BridgeConfigInput = z.input<typeof BridgeConfigSchema>;
