/**
 * Discovery Records
 *
 * Topic layout and Home Assistant MQTT discovery payloads for sensor entities.
 */

import type { DeviceIdentity, FieldMapping } from '../types.js';

export const DEFAULT_SENSOR_ICON = 'mdi:printer-3d';

export interface DiscoveryDevice {
  identifiers: string[];
  manufacturer: string;
  name: string;
  model: string;
}

export interface DiscoveryRecord {
  name: string;
  state_topic: string;
  unique_id: string;
  device: DiscoveryDevice;
  icon: string;
  unit_of_measurement?: string;
  device_class?: string;
  state_class?: string;
}

// -----------------------------------------------------------------------------
// Topic Layout
// -----------------------------------------------------------------------------

export function stateTopic(baseTopic: string, uniqueId: string): string {
  return `${baseTopic}/state/${uniqueId}`;
}

export function discoveryTopic(discoveryPrefix: string, deviceId: string, uniqueId: string): string {
  return `${discoveryPrefix}/sensor/${deviceId}/${uniqueId}/config`;
}

// -----------------------------------------------------------------------------
// Records
// -----------------------------------------------------------------------------

/**
 * Build the discovery record for one mapping. Optional attributes that are
 * unset or empty are left out of the record entirely.
 */
export function buildDiscoveryRecord(
  mapping: FieldMapping,
  device: DeviceIdentity,
  baseTopic: string
): DiscoveryRecord {
  const record: DiscoveryRecord = {
    name: mapping.name,
    state_topic: stateTopic(baseTopic, mapping.uniqueId),
    unique_id: mapping.uniqueId,
    device: {
      identifiers: [device.id],
      manufacturer: device.manufacturer,
      name: device.name,
      model: device.model,
    },
    icon: mapping.icon || DEFAULT_SENSOR_ICON,
  };

  if (mapping.unit) {
    record.unit_of_measurement = mapping.unit;
  }
  if (mapping.deviceClass) {
    record.device_class = mapping.deviceClass;
  }
  if (mapping.stateClass) {
    record.state_class = mapping.stateClass;
  }

  return record;
}

/**
 * Serialise a record as compact JSON. Key order follows construction, so the
 * same mapping always yields the same payload.
 */
export function encodeDiscoveryRecord(record: DiscoveryRecord): string {
  return JSON.stringify(record);
}
