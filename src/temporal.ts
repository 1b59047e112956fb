import { format, isValid, parse, parseISO } from 'date-fns';
import { ParseError } from './errors';
import type { TemporalType } from './types';

export interface TemporalOptions {
  /** date-fns pattern; when absent the value is parsed as ISO 8601, a time of day, then by the platform parser. */
  dateFormat?: string;
  parseOptions?: { additionalDigits?: 0 | 1 | 2 };
}

const OUTPUT_FORMATS: Record<TemporalType, string> = {
  date: 'yyyy-MM-dd',
  time: 'HH:mm:ss',
  datetime: 'yyyy-MM-dd HH:mm:ss',
};

// parseISO needs a date part; a bare time of day is read against the current date
const TIME_OF_DAY_FORMATS = ['HH:mm:ss.SSS', 'HH:mm:ss', 'HH:mm'];

function parseGeneral(value: string, options: TemporalOptions): Date {
  const iso = parseISO(value, options.parseOptions);
  if (isValid(iso)) return iso;
  const reference = new Date();
  for (const pattern of TIME_OF_DAY_FORMATS) {
    const time = parse(value, pattern, reference);
    if (isValid(time)) return time;
  }
  return new Date(value);
}

/**
 * Parse a temporal value and render it in local time, truncated to the field's type.
 *
 * @throws ParseError when the value cannot be parsed
 */
export function parseTemporal(fieldname: string, kind: TemporalType, value: unknown, options: TemporalOptions = {}): string {
  let date: Date;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'string') {
    date = options.dateFormat ? parse(value, options.dateFormat, new Date()) : parseGeneral(value, options);
  } else {
    throw new ParseError(fieldname, value, `Expected a date string for field ${fieldname}, got ${typeof value}`);
  }
  if (!isValid(date)) throw new ParseError(fieldname, value);
  // format() renders in local time, which normalizes values that carried an offset
  return format(date, OUTPUT_FORMATS[kind]);
}
