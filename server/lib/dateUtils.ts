/**
 * Shared date/time utility functions used across backend modules.
 * All functions are pure and work in UTC.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

function addUtcDays(date: Date, days: number): Date {
  const next = new Date(date);
  next.setUTCDate(next.getUTCDate() + days);
  return next;
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Day of the year with January 1st as day 1. */
function utcDayOfYear(date: Date): number {
  const jan1 = Date.UTC(date.getUTCFullYear(), 0, 1);
  return Math.floor((startOfUtcDay(date).getTime() - jan1) / DAY_MS) + 1;
}

/** `YYYY-MM-DDTHH:mm:ss` in UTC, the form the price-history endpoint accepts. */
function formatProviderDateTime(date: Date): string {
  return date.toISOString().slice(0, 19);
}

function formatDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function minDate(a: Date, b: Date): Date {
  return a.getTime() <= b.getTime() ? a : b;
}

export {
  DAY_MS,
  addUtcDays,
  startOfUtcDay,
  utcDayOfYear,
  formatProviderDateTime,
  formatDateKey,
  minDate,
};
