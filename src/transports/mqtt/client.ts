/**
 * MQTT Bus Client
 *
 * Opens the long-lived broker connection. The mqtt client reconnects on its
 * own and queues publishes while offline.
 */

import * as mqtt from 'mqtt';
import type { MqttClient } from 'mqtt';
import type pino from 'pino';
import { busLogger } from '../../observability/logger.js';
import { updateBusState } from '../../observability/metrics.js';
import type { BusConnectionConfig } from './types.js';

export function busUrl(config: Pick<BusConnectionConfig, 'protocol' | 'host' | 'port'>): string {
  return `${config.protocol}://${config.host}:${config.port}`;
}

export function createBusClient(config: BusConnectionConfig, logger: pino.Logger = busLogger()): MqttClient {
  const url = busUrl(config);
  const clientId = `${config.clientIdPrefix}-${Math.floor(Date.now() / 1000)}`;

  logger.info({ url, clientId }, 'Connecting to MQTT broker');

  const client = mqtt.connect(url, {
    clientId,
    username: config.username,
    password: config.password,
    keepalive: config.keepalive,
    reconnectPeriod: config.reconnectPeriod,
    clean: true,
  });

  client.on('connect', () => {
    updateBusState(true);
    logger.info('MQTT connected');
  });
  client.on('reconnect', () => logger.info('MQTT reconnecting'));
  client.on('close', () => {
    updateBusState(false);
    logger.debug('MQTT connection closed');
  });
  client.on('offline', () => logger.warn('MQTT offline'));
  client.on('error', (error) => logger.error({ err: error }, 'MQTT error'));

  return client;
}
