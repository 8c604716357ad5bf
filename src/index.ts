/**
 * WebSocket to MQTT Bridge
 *
 * Streams JSON status frames from a device WebSocket and republishes selected
 * fields as Home Assistant MQTT sensors.
 *
 * @packageDocumentation
 */

// Core components
export * from './core/index.js';

// Transports
export * from './transports/upstream/index.js';
export * from './transports/mqtt/index.js';

// Orchestrator
export { WsMqttBridge } from './bridge.js';
export type { BridgeDependencies, BusClientFactory } from './bridge.js';

// Observability
export * from './observability/index.js';

// Configuration
export * from './config/index.js';

// Version
export const VERSION = '0.1.0';
