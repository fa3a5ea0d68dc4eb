import { formatIsoDate, isValidCalendarDate, subtractDays, subtractMonths } from './calendar.js';
import type { CalendarDate } from './types.js';

/**
 * A date rule resolves a matched phrase against the reference date.
 * Returning null hands the input to the next rule.
 */
interface DateRule {
  name: string;
  pattern: RegExp;
  resolve(match: RegExpExecArray, reference: CalendarDate): CalendarDate | null;
}

type RelativeUnit = 'second' | 'minute' | 'hour' | 'day' | 'week' | 'month' | 'year';

function toDate(year: string | undefined, month: string | undefined, day: string | undefined): CalendarDate | null {
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  return isValidCalendarDate(y, m, d) ? { year: y, month: m, day: d } : null;
}

function isRelativeUnit(value: string): value is RelativeUnit {
  return ['second', 'minute', 'hour', 'day', 'week', 'month', 'year'].includes(value);
}

function subtractUnit(reference: CalendarDate, amount: number, unit: RelativeUnit): CalendarDate {
  switch (unit) {
    case 'second':
    case 'minute':
    case 'hour':
      return reference;
    case 'day':
      return subtractDays(reference, amount);
    case 'week':
      return subtractDays(reference, amount * 7);
    case 'month':
      return subtractMonths(reference, amount);
    case 'year':
      return subtractMonths(reference, amount * 12);
  }
}

/**
 * Evaluated top-down, first match wins. `MM/DD/YYYY` comes before `DD/MM/YYYY`,
 * so a string valid under both readings is read month-first.
 */
export const DATE_RULES: readonly DateRule[] = [
  {
    name: 'iso',
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[t ]\d{1,2}:\d{2}.*)?$/,
    resolve: (match) => toDate(match[1], match[2], match[3]),
  },
  {
    name: 'month-first',
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    resolve: (match) => toDate(match[3], match[1], match[2]),
  },
  {
    name: 'day-first',
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    resolve: (match) => toDate(match[3], match[2], match[1]),
  },
  {
    name: 'today',
    pattern: /^(?:today|just now)$/,
    resolve: (_match, reference) => reference,
  },
  {
    name: 'yesterday',
    pattern: /^yesterday$/,
    resolve: (_match, reference) => subtractDays(reference, 1),
  },
  {
    name: 'relative',
    pattern: /^(\d+|an?)\+?\s+(second|minute|hour|day|week|month|year)s?\s+ago$/,
    resolve: (match, reference) => {
      const rawAmount = match[1] ?? '';
      const unit = match[2] ?? '';
      if (!isRelativeUnit(unit)) return null;

      const amount = /^\d+$/.test(rawAmount) ? Number(rawAmount) : 1;
      if (!Number.isSafeInteger(amount)) return null;
      return subtractUnit(reference, amount, unit);
    },
  },
];

function isFormattable(date: CalendarDate): boolean {
  return isValidCalendarDate(date.year, date.month, date.day);
}

/**
 * Normalize an absolute or relative posted-date phrase to `YYYY-MM-DD`.
 * Unrecognized input, and phrases that reach outside years 1000-9999, yield null.
 * Nothing throws.
 */
export function normalizeDate(raw: string | null | undefined, reference: CalendarDate): string | null {
  if (!raw) return null;

  const text = raw.replace(/\s+/g, ' ').trim().toLowerCase();
  if (!text) return null;

  for (const rule of DATE_RULES) {
    const match = rule.pattern.exec(text);
    if (!match) continue;

    const resolved = rule.resolve(match, reference);
    if (resolved && isFormattable(resolved)) {
      return formatIsoDate(resolved);
    }
  }

  return null;
}
