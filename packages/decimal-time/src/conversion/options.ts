import { gregorianCalendar } from '../calendar/gregorian.js';
import type { Calendar } from '../calendar/types.js';

/**
 * Policy for turning a scaled day fraction into whole microseconds.
 * - `nearest`: round half away from zero, keeps round trips exact
 * - `truncate`: drop the sub-microsecond remainder
 */
export type RoundingPolicy = 'nearest' | 'truncate';

/**
 * Default rounding policy: round to nearest microsecond.
 */
export const DEFAULT_ROUNDING_POLICY: RoundingPolicy = 'nearest';

/**
 * Options accepted by every conversion function.
 */
export interface ConversionOptions {
  /** Calendar used for validation and ordinal-day arithmetic */
  calendar?: Calendar;
  /** Rounding applied when reconstructing time of day */
  rounding?: RoundingPolicy;
}

export interface ResolvedConversionOptions {
  calendar: Calendar;
  rounding: RoundingPolicy;
}

export function resolveConversionOptions(
  options: ConversionOptions = {},
): ResolvedConversionOptions {
  return {
    calendar: options.calendar ?? gregorianCalendar,
    rounding: options.rounding ?? DEFAULT_ROUNDING_POLICY,
  };
}
