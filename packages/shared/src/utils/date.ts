import { addDays, addHours, isAfter, isValid, parseISO } from 'date-fns';

const DURATION_RE = /^(\d+)(h|d)$/;

export interface Duration {
  value: number;
  unit: 'h' | 'd';
}

/**
 * Parse a duration string such as "6h", "24h" or "7d".
 */
export function parseDuration(duration: string): Duration {
  const match = DURATION_RE.exec(duration);
  if (!match) {
    throw new Error(`Invalid duration format "${duration}". Expected "6h", "24h", "7d", "30d", etc.`);
  }
  return { value: Number(match[1]), unit: match[2] === 'h' ? 'h' : 'd' };
}

export function addDuration(date: Date, duration: string): Date {
  const { value, unit } = parseDuration(duration);
  if (unit === 'h') return addHours(date, value);
  return addDays(date, value);
}

/**
 * True only when `expiresAt` parses and `now` is strictly after it.
 * Missing or unparsable timestamps never count as expired.
 */
export function isPastExpiry(expiresAt: string | undefined | null, now: Date = new Date()): boolean {
  if (!expiresAt) return false;
  const expiry = parseISO(expiresAt);
  if (!isValid(expiry)) return false;
  return isAfter(now, expiry);
}

export function toIsoTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}
