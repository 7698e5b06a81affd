import { ConversionError } from '../errors.js';

const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

/**
 * Parse a number written with a space as thousands separator and an optional
 * decimal comma, e.g. `25 028,80`.
 */
export function parseFrenchNumber(value: string): number {
  const cleaned = value.replace(/\s/g, '').replace(/,/g, '.');
  if (!NUMBER_PATTERN.test(cleaned)) {
    throw new ConversionError('not-numeric', value);
  }
  return Number(cleaned);
}

export function roundTo(num: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(num * factor) / factor;
}

/**
 * Parse an amount in euros. A trailing `c` means euro cents.
 *
 * parseAmount('25 028,80 €') === 25028.8
 * parseAmount('4,326 c€ ') === 0.04326
 */
export function parseAmount(amountStr: string): number {
  let value = amountStr.trim().replace(/€/g, '');
  let factor = 1;
  if (value.endsWith('c')) {
    value = value.slice(0, -1);
    factor = 0.01;
  }
  return roundTo(parseFrenchNumber(value) * factor, 6);
}

/** parseAmountUnit('25 028,80 €/mois') gives [25028.8, 'mois'] */
export function parseAmountUnit(value: string): [number, string] {
  const parts = value.split('/');
  const [amount, unit] = parts;
  if (parts.length !== 2 || amount === undefined || unit === undefined) {
    throw new ConversionError('wrong-shape', value, `Expected "<amount>/<unit>", got ${JSON.stringify(value)}`);
  }
  return [parseAmount(amount), unit.trim()];
}

export function parsePercent(value: string): number {
  return parseFrenchNumber(value.replace('%', ''));
}

/**
 * Split a value into its leading number and trailing unit.
 *
 * parseNumberUnit('25 028 kWh') gives [25028, 'kWh']
 * parseNumberUnit('- 25 028.2 € / W') gives [-25028.2, '€ / W']
 */
export function parseNumberUnit(value: string): [number, string] {
  const trimmed = value.trim();
  const unitStart = trimmed.search(/[^-\d,. ]/);
  if (unitStart === -1) {
    throw new ConversionError('wrong-shape', value, `No unit found in ${JSON.stringify(value)}`);
  }
  const numberPart = trimmed.slice(0, unitStart).trim();
  return [parseFrenchNumber(numberPart), trimmed.slice(unitStart).trim()];
}
