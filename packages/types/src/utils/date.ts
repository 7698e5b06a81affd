import { ConversionError } from '../errors.js';

/**
 * Convert a `dd/mm/yyyy` date into an ISO `yyyy-mm-dd` string.
 */
export function parseDmyDate(dateStr: string): string {
  const parts = dateStr.trim().split('/');
  const [day, month, year] = parts;
  if (parts.length !== 3 || day === undefined || month === undefined || year === undefined) {
    throw new ConversionError('wrong-shape', dateStr, `Expected dd/mm/yyyy, got ${JSON.stringify(dateStr)}`);
  }
  if (!parts.every((part) => /^\d+$/.test(part))) {
    throw new ConversionError('not-numeric', dateStr);
  }

  if (year.length !== 4) {
    throw new ConversionError('wrong-shape', dateStr, `Expected a four digit year, got ${JSON.stringify(dateStr)}`);
  }

  const d = parseInt(day, 10);
  const m = parseInt(month, 10);
  const y = parseInt(year, 10);
  const probe = new Date(0);
  probe.setUTCFullYear(y, m - 1, d);
  if (probe.getUTCFullYear() !== y || probe.getUTCMonth() !== m - 1 || probe.getUTCDate() !== d) {
    throw new ConversionError('wrong-shape', dateStr, `Invalid calendar date: ${dateStr}`);
  }

  return `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
}

/**
 * parsePeriod('du 01/05/2018 au 31/05/2018') gives ['2018-05-01', '2018-05-31']
 */
export function parsePeriod(value: string): [string, string] {
  const parts = value.split(' au ');
  const [from, to] = parts;
  if (parts.length !== 2 || from === undefined || to === undefined) {
    throw new ConversionError('wrong-shape', value, `Expected "du <date> au <date>", got ${JSON.stringify(value)}`);
  }
  return [parseDmyDate(from.replace('du ', '')), parseDmyDate(to)];
}

export function compareDates(a: string, b: string): number {
  return a.localeCompare(b);
}
