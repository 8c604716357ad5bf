/**
 * MQTT Transport Module
 */

export { MqttPublisher } from './publisher.js';
export type { StatePublisher } from './publisher.js';
export { createBusClient, busUrl } from './client.js';
export * from './types.js';
