// Expiry calendar — pure date math for index option contract expiries.
// Never reads the wall clock: callers pass the message date explicitly.

import { SignalParseError } from './errors';
import type { CalendarDate, ExpiryRules, Underlying, Weekday } from '../types';

export const MONTHS = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'] as const;
export type MonthName = (typeof MONTHS)[number];

export const WEEKDAYS = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'] as const;
const WEEKDAY_VALUES: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

/** NSE/BSE contract dates are IST; IST has no DST */
const IST_OFFSET_MINUTES = 330;

export const DEFAULT_EXPIRY_RULES: ExpiryRules = {
  niftyWeekday: 4,
  sensexWeekday: 4,
  bankniftyWeekday: 2,
};

export function isMonthName(value: string): value is MonthName {
  return (MONTHS as readonly string[]).includes(value);
}

export function monthIndex(name: MonthName): number {
  return MONTHS.indexOf(name) + 1;
}

/** Calendar date of an instant in IST */
export function toIstDate(instant: Date): CalendarDate {
  const shifted = new Date(instant.getTime() + IST_OFFSET_MINUTES * 60_000);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

function toUtc(date: CalendarDate): Date {
  return new Date(Date.UTC(date.year, date.month - 1, date.day));
}

function fromUtc(d: Date): CalendarDate {
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

export function weekdayOf(date: CalendarDate): Weekday {
  const day = toUtc(date).getUTCDay();
  return WEEKDAY_VALUES[day];
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const d = toUtc(date);
  d.setUTCDate(d.getUTCDate() + days);
  return fromUtc(d);
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return toUtc(a).getTime() - toUtc(b).getTime();
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isValidDate(date: CalendarDate): boolean {
  return (
    Number.isInteger(date.year) &&
    date.month >= 1 &&
    date.month <= 12 &&
    date.day >= 1 &&
    date.day <= daysInMonth(date.year, date.month)
  );
}

/** First date on or after `start` that falls on `weekday` */
export function nextWeekdayOnOrAfter(start: CalendarDate, weekday: Weekday): CalendarDate {
  const ahead = (weekday - weekdayOf(start) + 7) % 7;
  return addDays(start, ahead);
}

/** Last `weekday` of the given month */
export function lastWeekdayOfMonth(year: number, month: number, weekday: Weekday): CalendarDate {
  const last: CalendarDate = { year, month, day: daysInMonth(year, month) };
  const back = (weekdayOf(last) - weekday + 7) % 7;
  return addDays(last, -back);
}

/**
 * Implicit expiry for a signal that names no date.
 *
 * NIFTY/SENSEX: next weekly expiry on or after the message date (same day if it is expiry day).
 * BANKNIFTY: last expiry weekday of the month, rolling to next month once it has passed.
 */
export function resolveImplicitExpiry(
  underlying: Underlying,
  messageDate: CalendarDate,
  rules: ExpiryRules = DEFAULT_EXPIRY_RULES,
): CalendarDate {
  switch (underlying) {
    case 'NIFTY':
      return nextWeekdayOnOrAfter(messageDate, rules.niftyWeekday);
    case 'SENSEX':
      return nextWeekdayOnOrAfter(messageDate, rules.sensexWeekday);
    case 'BANKNIFTY': {
      const current = lastWeekdayOfMonth(messageDate.year, messageDate.month, rules.bankniftyWeekday);
      if (compareDates(current, messageDate) >= 0) return current;
      const nextMonth = messageDate.month === 12 ? 1 : messageDate.month + 1;
      const nextYear = messageDate.month === 12 ? messageDate.year + 1 : messageDate.year;
      return lastWeekdayOfMonth(nextYear, nextMonth, rules.bankniftyWeekday);
    }
  }
}

/**
 * Resolve an explicit "DD MON" expiry against the message date.
 * A month earlier than the message month belongs to next year; a day already past in the
 * message month is stale.
 */
export function resolveExplicitExpiry(day: number, month: MonthName, messageDate: CalendarDate): CalendarDate {
  const monthNum = monthIndex(month);
  const year = monthNum < messageDate.month ? messageDate.year + 1 : messageDate.year;
  const candidate: CalendarDate = { year, month: monthNum, day };

  if (!isValidDate(candidate)) {
    throw new SignalParseError('ExpiryResolutionError', `Invalid expiry date ${day} ${month}`);
  }
  if (compareDates(candidate, messageDate) < 0) {
    throw new SignalParseError(
      'ExpiryResolutionError',
      `Expiry ${day} ${month} is before message date ${formatIsoDate(messageDate)}`,
    );
  }
  return candidate;
}

/** "03 DEC" */
export function formatExpiryLabel(date: CalendarDate): string {
  return `${String(date.day).padStart(2, '0')} ${MONTHS[date.month - 1]}`;
}

/** "2025-12-03" */
export function formatIsoDate(date: CalendarDate): string {
  return `${date.year}-${String(date.month).padStart(2, '0')}-${String(date.day).padStart(2, '0')}`;
}

/** Parse "2025-12-03"; null when malformed */
export function parseIsoDate(value: string): CalendarDate | null {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return null;
  const date: CalendarDate = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  return isValidDate(date) ? date : null;
}

/** Parse a weekday name ("THU", "THURSDAY") */
export function parseWeekday(value: string): Weekday | null {
  const prefix = value.trim().toUpperCase().slice(0, 3);
  const idx = WEEKDAYS.findIndex((w) => w === prefix);
  return idx === -1 ? null : WEEKDAY_VALUES[idx];
}
