/**
 * Value Converters for mesh readings ↔ framework attributes
 *
 * The mesh reports temperature in °C and humidity in %RH as floats.
 * Measurement attributes carry both in hundredths as integers.
 */

import { LIMITS } from '../BridgeProtocol.mjs';

/**
 * Convert a temperature in °C to a MeasuredValue (0.01 °C units)
 *
 * @example
 * celsiusToMeasuredValue(21.5)  // returns 2150
 * celsiusToMeasuredValue(-4.25) // returns -425
 */
export function celsiusToMeasuredValue(celsius: number): number {
  if (typeof celsius !== 'number' || Number.isNaN(celsius)) {
    throw new TypeError('Temperature must be a number');
  }

  const scaled = Math.round(celsius * 100);
  return Math.max(LIMITS.TEMPERATURE_MIN, Math.min(LIMITS.TEMPERATURE_MAX, scaled));
}

/**
 * Convert a relative humidity in % to a MeasuredValue (0.01 % units)
 *
 * @example
 * humidityToMeasuredValue(48.3) // returns 4830
 * humidityToMeasuredValue(104)  // returns 10000
 */
export function humidityToMeasuredValue(percent: number): number {
  if (typeof percent !== 'number' || Number.isNaN(percent)) {
    throw new TypeError('Humidity must be a number');
  }

  const scaled = Math.round(percent * 100);
  return Math.max(0, Math.min(LIMITS.HUMIDITY_MAX, scaled));
}

/**
 * Truncate an endpoint label to what the framework accepts
 */
export function clampLabel(label: string): string {
  return label.length > LIMITS.LABEL_MAX_LENGTH
    ? label.slice(0, LIMITS.LABEL_MAX_LENGTH)
    : label;
}
