/**
 * Value Transformer
 *
 * Maps a raw extracted value onto its published form. Numeric modes fall back
 * to the untouched input when it does not parse, so a single odd field never
 * aborts a frame.
 */

import type { JsonValue } from '../types.js';
import { TransformMode } from '../types.js';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const EXACT_TIE_TAIL = /^50*$/;

/**
 * Parse a number from a JSON number, a boolean (1 or 0) or a decimal string.
 * Returns null for anything else, including non-finite results.
 */
export function parseNumeric(value: JsonValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) return null;

    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}

/**
 * Round to a fixed number of decimal places, working on the exact binary value
 * (1.615 is stored just below the tie and rounds to 1.61). Exact ties go to
 * the even digit.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }

  const rounded = Number(value.toFixed(decimals));

  // toFixed settles exact ties away from zero
  const exact = Math.abs(value).toFixed(100);
  const cut = exact.indexOf('.') + 1 + decimals;
  if (!EXACT_TIE_TAIL.test(exact.slice(cut))) {
    return rounded;
  }

  const kept = exact.slice(0, cut);
  const lastDigit = Number(kept.replace('.', '').slice(-1));
  return lastDigit % 2 === 0 ? Math.sign(value) * Number(kept) : rounded;
}

/**
 * Format whole seconds as HH:MM:SS. Hours widen past two digits rather than wrap.
 */
export function formatHms(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor(mod(totalSeconds, 3600) / 60);
  const seconds = mod(totalSeconds, 60);

  return [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
}

function mod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

/**
 * Apply a transform mode to an extracted value.
 */
export function transformValue(value: JsonValue | null | undefined, mode: TransformMode): JsonValue | null {
  if (value === null || value === undefined) {
    return null;
  }

  switch (mode) {
    case TransformMode.PERCENT_0_1_TO_0_100: {
      const parsed = parseNumeric(value);
      if (parsed === null) return value;

      return parsed >= 0 && parsed <= 1 ? roundTo(parsed * 100, 2) : roundTo(parsed, 2);
    }

    case TransformMode.SECONDS_TO_HMS: {
      const parsed = parseNumeric(value);
      if (parsed === null) return value;

      return formatHms(Math.trunc(parsed));
    }

    case TransformMode.NONE:
      return value;
  }
}

/**
 * Render a transformed value as an MQTT state payload. Absent values become an
 * empty payload so the retained topic is cleared.
 */
export function encodeStateValue(value: JsonValue | null, mode: TransformMode = TransformMode.NONE): string {
  if (value === null) {
    return '';
  }

  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number') {
    // percentages are always rendered as decimals: 42 -> "42.0"
    if (mode === TransformMode.PERCENT_0_1_TO_0_100 && Number.isInteger(value)) {
      return value.toFixed(1);
    }
    return String(value);
  }

  if (typeof value === 'boolean') {
    return String(value);
  }

  return JSON.stringify(value);
}
