/**
 * Renders a number in positional notation, never exponent notation.
 * Digits are the shortest round-trip digits of `String(value)`.
 *
 * @example
 * toPlainDecimalString(0.5) // "0.5"
 * toPlainDecimalString(1.5e-7) // "0.00000015"
 * toPlainDecimalString(1e21) // "1000000000000000000000"
 */
export function toPlainDecimalString(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (match === null) {
    return text;
  }

  const [, sign, integerDigits, fractionPart = '', exponentText] = match;
  const digits = integerDigits + fractionPart;
  const pointIndex = integerDigits.length + Number(exponentText);

  if (pointIndex <= 0) {
    return `${sign}0.${'0'.repeat(-pointIndex)}${digits}`;
  }
  if (pointIndex >= digits.length) {
    return `${sign}${digits}${'0'.repeat(pointIndex - digits.length)}`;
  }
  return `${sign}${digits.slice(0, pointIndex)}.${digits.slice(pointIndex)}`;
}

/**
 * Text of a day fraction with at least one digit after the point.
 *
 * @example
 * fractionText(0) // "0.0"
 * fractionText(0.75) // "0.75"
 */
export function fractionText(decimalDay: number): string {
  const text = toPlainDecimalString(decimalDay);
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

/**
 * Digits after the point of `fractionText`.
 *
 * @example
 * fractionDigits(0) // "0"
 * fractionDigits(0.75) // "75"
 */
export function fractionDigits(decimalDay: number): string {
  const text = fractionText(decimalDay);
  const pointIndex = text.indexOf('.');
  return pointIndex === -1 ? text : text.slice(pointIndex + 1);
}
