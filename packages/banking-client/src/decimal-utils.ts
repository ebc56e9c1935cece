import { Decimal } from 'decimal.js';

/**
 * Parse a number, numeric string or Decimal. Returns undefined for blank,
 * unparseable, NaN or infinite input.
 */
export function tryParseDecimal(value: number | string | Decimal): Decimal | undefined {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }

  let decimal: Decimal;
  try {
    decimal = value instanceof Decimal ? value : new Decimal(typeof value === 'string' ? value.trim() : value);
  } catch {
    return undefined;
  }
  return decimal.isFinite() ? decimal : undefined;
}
