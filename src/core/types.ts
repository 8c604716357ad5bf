/**
 * Core Types
 *
 * Shared value and mapping types for the bridging pipeline.
 */

// -----------------------------------------------------------------------------
// JSON Values
// -----------------------------------------------------------------------------

export type JsonPrimitive = string | number | boolean | null;

export type JsonArray = JsonValue[];

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Any value JSON.parse can produce. Incoming frames are arbitrary trees of this type.
 */
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// -----------------------------------------------------------------------------
// Field Mappings
// -----------------------------------------------------------------------------

export const TransformMode = {
  NONE: 'none',
  PERCENT_0_1_TO_0_100: 'percent_0_1_to_0_100',
  SECONDS_TO_HMS: 'seconds_to_hms',
} as const;

export type TransformMode = (typeof TransformMode)[keyof typeof TransformMode];

export const TRANSFORM_MODES = [
  TransformMode.NONE,
  TransformMode.PERCENT_0_1_TO_0_100,
  TransformMode.SECONDS_TO_HMS,
] as const;

/**
 * One monitored field: where to find it in a frame, how to transform it,
 * and the sensor metadata announced through discovery.
 */
export interface FieldMapping {
  /** Stable identifier; derives both the state and discovery topics */
  uniqueId: string;
  /** Display name of the sensor entity */
  name: string;
  /** JSON path expression evaluated against each frame */
  path: string;
  transform: TransformMode;
  unit?: string;
  icon?: string;
  deviceClass?: string;
  stateClass?: string;
}

export interface DeviceIdentity {
  id: string;
  name: string;
  manufacturer: string;
  model: string;
}

/**
 * Values extracted from one frame, keyed by unique id in mapping order.
 * A field with no match maps to null; the key is always present.
 */
export type ExtractedValueSet = Map<string, JsonValue | null>;
