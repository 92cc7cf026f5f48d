/**
 * Record shapes exchanged with a MoneyMoney backend.
 */

/** Decoded but unvalidated record, exactly as the backend returns it. */
export type RawRecord = Record<string, unknown>;

/** Calendar date, `YYYY-MM-DD`. */
export type IsoDate = string;

/** Record after normalizeRecord: no sentinel dates, no internal keys, no Date objects. */
export type NormalizedRecord = Record<string, unknown>;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Local calendar day of a timestamp */
export function toIsoDate(value: Date): IsoDate {
  const year = String(value.getFullYear()).padStart(4, '0');
  const month = String(value.getMonth() + 1).padStart(2, '0');
  const day = String(value.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/** Local midnight of an ISO calendar date, or null when the string is not one */
export function fromIsoDate(value: string): Date | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(year, month - 1, day);
  // Date rolls impossible days over into the next month
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

export function isIsoDate(value: unknown): value is IsoDate {
  return typeof value === 'string' && fromIsoDate(value) !== null;
}

export function daysAgo(days: number, now: Date = new Date()): IsoDate {
  const date = new Date(now.getFullYear(), now.getMonth(), now.getDate() - days);
  return toIsoDate(date);
}
