/**
 * Published-date parsing against a fixed list of accepted formats
 */

import { UTCDate } from '@date-fns/utc';
import { isValid, parse, parseISO } from 'date-fns';

/** RFC 3339 with an explicit offset or Z, optional fractional seconds */
const ZONED_ISO = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

/** Formats without a zone; read as UTC */
const NAIVE_FORMATS = [
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd',
  'MMMM d, yyyy',
  'MMM d, yyyy',
  'yyyy/MM/dd',
] as const;

/**
 * Returns undefined when no accepted format matches
 */
export function parsePublishedDate(value: string): Date | undefined {
  const text = value.trim();
  if (!text) {
    return undefined;
  }

  if (ZONED_ISO.test(text)) {
    const parsed = parseISO(text);
    return isValid(parsed) ? parsed : undefined;
  }

  // Fields are set with UTC setters; the local zone never applies
  const reference = new UTCDate(2000, 0, 1);
  for (const format of NAIVE_FORMATS) {
    const parsed = parse(text, format, reference);
    if (isValid(parsed)) {
      return new Date(parsed.getTime());
    }
  }

  return undefined;
}
