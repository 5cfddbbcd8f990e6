import type { DecimalTime } from '../domain/types.js';
import { fractionDigits, fractionText } from './plainDecimal.js';

/**
 * Directive escape character.
 */
export const DIRECTIVE_ESCAPE = '%';

/**
 * Expands the character following `%`, or returns undefined for an
 * unrecognized directive.
 */
function expandDirective(
  directive: string,
  decimalTime: DecimalTime,
): string | undefined {
  switch (directive) {
    case 'Y':
      return String(decimalTime.year);
    case 'd':
      return String(decimalTime.dayOfYear).padStart(3, '0');
    case 'D':
      return String(decimalTime.dayOfYear);
    case 'f':
      return fractionText(decimalTime.decimalDay);
    case 'F':
      return fractionDigits(decimalTime.decimalDay);
    case DIRECTIVE_ESCAPE:
      return DIRECTIVE_ESCAPE;
    default:
      return undefined;
  }
}

/**
 * Renders a decimal time through a template of `%` directives.
 *
 * Directives:
 * - `%Y`: year, signed, unpadded
 * - `%d`: day of year, zero-padded to 3 digits
 * - `%D`: day of year, unpadded
 * - `%f`: day fraction with leading "0." (e.g. "0.5", "0.0")
 * - `%F`: digits after the point of `%f` (e.g. "5", "0")
 * - `%%`: literal "%"
 *
 * Unrecognized directives and a trailing "%" are copied through unchanged.
 * Never throws.
 *
 * @example
 * formatDecimalTime(createDecimalTime(2025, 73, 0.5), '%Y.%D.%F') // "2025.73.5"
 * formatDecimalTime(createDecimalTime(2025, 73, 0.5), 'Day: %d, Time: %f') // "Day: 073, Time: 0.5"
 */
export function formatDecimalTime(
  decimalTime: DecimalTime,
  template: string,
): string {
  let output = '';

  for (let i = 0; i < template.length; i++) {
    const char = template.charAt(i);
    if (char !== DIRECTIVE_ESCAPE || i + 1 >= template.length) {
      output += char;
      continue;
    }

    const directive = template.charAt(i + 1);
    output += expandDirective(directive, decimalTime) ?? char + directive;
    i++;
  }

  return output;
}
