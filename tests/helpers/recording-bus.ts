/**
 * Recording Bus Client
 *
 * In-process stand-in for the MQTT client: keeps every publish in order and
 * can be told to report a broker failure.
 */

import type { IClientPublishOptions } from 'mqtt';
import type { BusClient } from '../../src/transports/mqtt/types.js';

export interface RecordedPublish {
  topic: string;
  payload: string;
  qos: number | undefined;
  retain: boolean | undefined;
}

export class RecordingBusClient implements BusClient {
  connected = true;
  ended = false;
  failWith: Error | undefined;
  readonly published: RecordedPublish[] = [];

  publish(
    topic: string,
    message: string,
    opts: IClientPublishOptions,
    callback?: (error?: Error) => void
  ): this {
    this.published.push({ topic, payload: message, qos: opts.qos, retain: opts.retain });
    callback?.(this.failWith);
    return this;
  }

  async endAsync(): Promise<void> {
    this.ended = true;
    this.connected = false;
  }

  topics(): string[] {
    return this.published.map((p) => p.topic);
  }

  forTopic(topic: string): RecordedPublish[] {
    return this.published.filter((p) => p.topic === topic);
  }

  clear(): void {
    this.published.length = 0;
  }
}

export async function waitFor(condition: () => boolean, timeout = 2000): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error('Timeout waiting for condition');
    }
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
}
