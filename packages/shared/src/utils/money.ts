/**
 * Money helpers. Values travel as integer cents so limit checks are exact.
 */

import type { Cents } from '../types';

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Convert dollars to cents.
 * Strings are parsed digit by digit ("10.01" → 1001); numbers are rounded to
 * the nearest cent. Returns NaN for negative or malformed input.
 */
export function toCents(dollars: number | string): Cents {
  if (typeof dollars === 'number') {
    if (!Number.isFinite(dollars) || dollars < 0) return Number.NaN;
    return Math.round(dollars * 100);
  }

  const match = DECIMAL_PATTERN.exec(dollars.trim());
  if (!match) return Number.NaN;
  const whole = parseInt(match[1], 10);
  const fraction = match[2] ? parseInt(match[2].padEnd(2, '0'), 10) : 0;
  return whole * 100 + fraction;
}

/** "$10.01" */
export function formatCents(cents: Cents): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(Math.round(cents));
  const whole = Math.floor(abs / 100);
  const fraction = (abs % 100).toString().padStart(2, '0');
  return `${sign}$${whole}.${fraction}`;
}

export function isValidCents(value: number): value is Cents {
  return Number.isSafeInteger(value) && value >= 0;
}
