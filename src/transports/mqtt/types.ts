/**
 * MQTT Transport Types
 */

import type { IClientPublishOptions } from 'mqtt';
import type { DeviceIdentity } from '../../core/types.js';

/**
 * The slice of the MQTT client the publisher relies on. `MqttClient` from the
 * mqtt package satisfies it; tests substitute a recording fake.
 */
export interface BusClient {
  readonly connected: boolean;
  publish(
    topic: string,
    message: string,
    opts: IClientPublishOptions,
    callback?: (error?: Error) => void
  ): unknown;
  endAsync(): Promise<void>;
}

export interface BusConnectionConfig {
  host: string;
  port: number;
  protocol: 'mqtt' | 'mqtts' | 'ws' | 'wss';
  username?: string;
  password?: string;
  /** Client id prefix; a timestamp suffix keeps reconnecting instances distinct */
  clientIdPrefix: string;
  /** Keepalive (s) */
  keepalive: number;
  /** Delay between broker reconnect attempts (ms) */
  reconnectPeriod: number;
}

export interface PublisherConfig {
  /** Root for state topics: `{baseTopic}/state/{uniqueId}` */
  baseTopic: string;
  /** Home Assistant discovery prefix */
  discoveryPrefix: string;
  device: DeviceIdentity;
}

export interface PublisherMetrics {
  statePublished: number;
  discoveryPublished: number;
  publishErrors: number;
}

export const INITIAL_PUBLISHER_METRICS: PublisherMetrics = {
  statePublished: 0,
  discoveryPublished: 0,
  publishErrors: 0,
};
