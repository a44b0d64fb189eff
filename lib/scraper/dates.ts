import { format, isValid, parse } from 'date-fns';

const DATE_FORMATS = [
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'EEE, MMM d, yyyy',
  'EEEE, MMMM d, yyyy',
  'd MMM yyyy',
  'yyyy-MM-dd',
  // Dates in the current year are shown without one
  'MMM d',
  'EEE, MMM d',
];

const TIME_FORMATS = ['h:mm a', 'h:mm:ss a', 'HH:mm', 'HH:mm:ss'];

function clean(text: string, label: RegExp): string {
  return text
    .replace(label, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function parseFirst(text: string, formats: string[], reference: Date): Date | null {
  for (const fmt of formats) {
    const parsed = parse(text, fmt, reference);
    if (isValid(parsed)) return parsed;
  }
  return null;
}

/**
 * Capture time from the info panel's date and time labels.
 *
 * Returns `yyyy-MM-ddTHH:mm:ss` when both parse, `yyyy-MM-dd` when only the
 * date does, and null otherwise. Times are the source's local wall clock.
 */
export function parseTakenAt(
  dateText: string | null,
  timeText: string | null,
  reference: Date = new Date()
): string | null {
  if (!dateText) return null;

  const date = parseFirst(clean(dateText, /^date taken:?/i), DATE_FORMATS, reference);
  if (!date) return null;

  if (timeText) {
    const time = clean(timeText, /^time taken:?/i)
      .replace(/^[A-Za-z]{3,9},\s*/, '')
      .replace(/\s*(GMT|UTC)[+-]?[\d:]*$/i, '');
    const parsedTime = parseFirst(time, TIME_FORMATS, date);
    if (parsedTime) {
      return format(parsedTime, "yyyy-MM-dd'T'HH:mm:ss");
    }
  }

  return format(date, 'yyyy-MM-dd');
}

/** True when the value carries a time of day, not just a date */
export function hasTimeOfDay(takenAt: string): boolean {
  return takenAt.includes('T');
}
