/**
 * MQTT Publisher
 *
 * Publishes discovery records (qos 1, retained) and field state (qos 0,
 * retained). Calls return immediately; broker failures surface through the
 * publish callback and are logged, never thrown.
 */

import type pino from 'pino';
import type { FieldMapping, JsonValue, TransformMode } from '../../core/types.js';
import {
  buildDiscoveryRecord,
  discoveryTopic,
  encodeDiscoveryRecord,
  stateTopic,
} from '../../core/discovery/discovery.js';
import { encodeStateValue } from '../../core/transform/transformer.js';
import { busLogger } from '../../observability/logger.js';
import { recordPublish, recordPublishError } from '../../observability/metrics.js';
import type { PublishKind } from '../../observability/metrics.js';
import type { BusClient, PublisherConfig, PublisherMetrics } from './types.js';
import { INITIAL_PUBLISHER_METRICS } from './types.js';

/**
 * What the upstream supervisor needs from a publisher.
 */
export interface StatePublisher {
  publishAllDiscovery(mappings: readonly FieldMapping[]): void;
  publishState(uniqueId: string, value: JsonValue | null, mode?: TransformMode): void;
}

export class MqttPublisher implements StatePublisher {
  private readonly config: PublisherConfig;
  private readonly logger: pino.Logger;
  private metrics: PublisherMetrics = { ...INITIAL_PUBLISHER_METRICS };

  constructor(
    private readonly client: BusClient,
    config: PublisherConfig,
    logger: pino.Logger = busLogger()
  ) {
    this.config = config;
    this.logger = logger;
  }

  // ---------------------------------------------------------------------------
  // Publishing
  // ---------------------------------------------------------------------------

  /**
   * Publish the discovery record for one mapping. Re-publishing yields an
   * identical retained payload.
   */
  publishDiscovery(mapping: FieldMapping): void {
    const topic = discoveryTopic(this.config.discoveryPrefix, this.config.device.id, mapping.uniqueId);
    const record = buildDiscoveryRecord(mapping, this.config.device, this.config.baseTopic);

    this.send('discovery', topic, encodeDiscoveryRecord(record), 1);
    this.metrics.discoveryPublished++;
    this.logger.info({ topic }, 'Published discovery');
  }

  publishAllDiscovery(mappings: readonly FieldMapping[]): void {
    for (const mapping of mappings) {
      this.publishDiscovery(mapping);
    }
  }

  /**
   * Publish a field value; an absent value publishes an empty payload.
   */
  publishState(uniqueId: string, value: JsonValue | null, mode?: TransformMode): void {
    const topic = stateTopic(this.config.baseTopic, uniqueId);

    this.send('state', topic, encodeStateValue(value, mode), 0);
    this.metrics.statePublished++;
  }

  /**
   * End the broker connection. Only called at shutdown.
   */
  async close(): Promise<void> {
    await this.client.endAsync();
  }

  private send(kind: PublishKind, topic: string, payload: string, qos: 0 | 1): void {
    this.client.publish(topic, payload, { qos, retain: true }, (error) => {
      if (error) {
        this.metrics.publishErrors++;
        recordPublishError(kind);
        this.logger.warn({ err: error, topic }, 'Publish failed');
      }
    });
    recordPublish(kind);
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  isConnected(): boolean {
    return this.client.connected;
  }

  getMetrics(): Readonly<PublisherMetrics> {
    return { ...this.metrics };
  }

  getConfig(): Readonly<PublisherConfig> {
    return { ...this.config };
  }
}
