import { format } from 'date-fns';
import { DATE_CANDIDATES, parseDateWith } from '../validate/coerce';

/** First candidate format that parses the value; Date cells pass through. */
export const toDate = (value: unknown): Date | null => {
  for (const candidate of DATE_CANDIDATES) {
    const parsed = parseDateWith(value, candidate);
    if (parsed) return parsed;
  }
  return null;
};

/** Calendar day of a value, or its trimmed text when it is not a recognizable date. */
export const dayKey = (value: unknown, pattern = 'yyyy-MM-dd'): string | null => {
  if (value === null || value === undefined) return null;
  const date = toDate(value);
  if (date) return format(date, pattern);
  const text = String(value).trim();
  return text || null;
};
