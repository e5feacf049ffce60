import { format, isValid, parseISO } from 'date-fns';

const MINUTES_PER_DAY = 24 * 60;

/**
 * Parses an `H:mm` / `HH:mm` wall-clock time into minutes after midnight.
 * Returns null for anything else, including times past 24:00.
 */
export function parseClockTime(value: string): number | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (minutes > 59) {
    return null;
  }
  const total = hours * 60 + minutes;
  return total <= MINUTES_PER_DAY ? total : null;
}

export function formatClockTime(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Parses a strict `YYYY-MM-DD` calendar date. `2026-02-30` and friends are
 * rejected.
 */
export function parseCalendarDate(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return null;
  }
  const date = parseISO(value);
  if (!isValid(date) || format(date, 'yyyy-MM-dd') !== value) {
    return null;
  }
  return date;
}

/** Short English weekday label (`Mon` ... `Sun`), or '' for a bad date. */
export function dayOfWeekLabel(value: string): string {
  const date = parseCalendarDate(value);
  return date ? format(date, 'EEE') : '';
}
