/**
 * printf-style number formatting for reports and data files
 */

/** `%<width>i`: truncated integer, right-aligned */
export function formatInteger(value: number, width: number = 0): string {
  return String(Math.trunc(value)).padStart(width);
}

/** `%<width>.<digits>f` */
export function formatFixed(value: number, digits: number, width: number = 0): string {
  return value.toFixed(digits).padStart(width);
}

/**
 * `%e`: six fraction digits and an exponent of at least two digits,
 * e.g. `1.500000e-03`
 */
export function formatScientific(value: number): string {
  if (Number.isNaN(value)) {
    return 'nan';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? 'inf' : '-inf';
  }
  const sign = Object.is(value, -0) ? '-' : '';
  const [mantissa, exponent] = value.toExponential(6).split('e');
  const exponentSign = exponent.startsWith('-') ? '-' : '+';
  const exponentDigits = exponent.replace(/^[+-]/, '').padStart(2, '0');
  return `${sign}${mantissa}e${exponentSign}${exponentDigits}`;
}
