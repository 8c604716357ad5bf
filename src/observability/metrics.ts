/**
 * Prometheus Metrics
 *
 * Metrics collection and export for monitoring.
 * Exposes Prometheus-compatible metrics endpoint.
 */

import {
  Registry,
  Counter,
  Gauge,
  collectDefaultMetrics,
} from 'prom-client';

// -----------------------------------------------------------------------------
// Registry
// -----------------------------------------------------------------------------

const registry = new Registry();

// Collect default Node.js metrics (memory, CPU, etc.)
collectDefaultMetrics({ register: registry });

// -----------------------------------------------------------------------------
// Upstream Metrics
// -----------------------------------------------------------------------------

export const upstreamConnectedGauge = new Gauge({
  name: 'ws_mqtt_bridge_upstream_connected',
  help: 'Upstream WebSocket state (1 = connected, 0 = disconnected)',
  registers: [registry],
});

export const upstreamReconnects = new Counter({
  name: 'ws_mqtt_bridge_upstream_reconnects_total',
  help: 'Total scheduled upstream reconnect attempts',
  registers: [registry],
});

export const upstreamBackoffGauge = new Gauge({
  name: 'ws_mqtt_bridge_upstream_backoff_seconds',
  help: 'Delay before the next upstream reconnect attempt',
  registers: [registry],
});

export const framesTotal = new Counter({
  name: 'ws_mqtt_bridge_frames_total',
  help: 'Frames received from upstream by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

// -----------------------------------------------------------------------------
// Bus Metrics
// -----------------------------------------------------------------------------

export const publishesTotal = new Counter({
  name: 'ws_mqtt_bridge_publishes_total',
  help: 'Messages handed to the MQTT client by kind',
  labelNames: ['kind'] as const,
  registers: [registry],
});

export const publishErrors = new Counter({
  name: 'ws_mqtt_bridge_publish_errors_total',
  help: 'Publish failures reported by the MQTT client by kind',
  labelNames: ['kind'] as const,
  registers: [registry],
});

export const busConnectedGauge = new Gauge({
  name: 'ws_mqtt_bridge_mqtt_connected',
  help: 'MQTT connection state (1 = connected, 0 = disconnected)',
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

export type FrameOutcome = 'processed' | 'dropped' | 'failed';

export type PublishKind = 'state' | 'discovery';

export function recordFrame(outcome: FrameOutcome): void {
  framesTotal.labels(outcome).inc();
}

export function recordPublish(kind: PublishKind): void {
  publishesTotal.labels(kind).inc();
}

export function recordPublishError(kind: PublishKind): void {
  publishErrors.labels(kind).inc();
}

export function updateUpstreamState(connected: boolean): void {
  upstreamConnectedGauge.set(connected ? 1 : 0);
}

export function recordUpstreamReconnect(delayMs: number): void {
  upstreamReconnects.inc();
  upstreamBackoffGauge.set(delayMs / 1000);
}

export function updateBusState(connected: boolean): void {
  busConnectedGauge.set(connected ? 1 : 0);
}
