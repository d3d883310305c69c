/**
 * Utilities barrel export
 */

export {
  celsiusToMeasuredValue,
  humidityToMeasuredValue,
  clampLabel,
} from './ValueConverters.mjs';

export { ReentrantLock } from './ReentrantLock.mjs';
