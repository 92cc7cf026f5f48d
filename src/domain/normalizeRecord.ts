import { logger } from '../infra/logger.js';
import { toIsoDate, type NormalizedRecord, type RawRecord } from './records.js';

/** MoneyMoney reports "no date set" as the epoch; anything up to this day is not a real date. */
export const SENTINEL_DATE = '1970-01-02';

/** Internal ids superseded by human-readable fields */
const ALWAYS_DROPPED = new Set(['categoryId']);

export interface NormalizeOptions {
  /** Entity name used in diagnostics */
  entity: string;
  attributes: readonly string[];
  ignored?: readonly string[];
}

/**
 * Turns a raw backend record into a clean attribute map.
 *
 * Unknown keys are kept and logged so new MoneyMoney fields never break reads.
 * Dates become `YYYY-MM-DD`; sentinel dates, ignored keys and null values disappear.
 */
export function normalizeRecord(raw: RawRecord, options: NormalizeOptions): NormalizedRecord {
  const { entity, attributes, ignored = [] } = options;
  const clean: NormalizedRecord = {};
  const unknown: string[] = [];

  for (const [key, value] of Object.entries(raw)) {
    if (ALWAYS_DROPPED.has(key) || ignored.includes(key)) {
      continue;
    }
    if (!attributes.includes(key)) {
      unknown.push(key);
    }
    if (value === null || value === undefined) {
      continue;
    }

    if (value instanceof Date) {
      const date = toIsoDate(value);
      if (date > SENTINEL_DATE) {
        clean[key] = date;
      }
      continue;
    }

    clean[key] = value;
  }

  flattenBalance(clean);

  if (unknown.length > 0) {
    logger.debug('Unknown MoneyMoney attributes', { entity, attributes: unknown });
  }

  return clean;
}

/**
 * `balance: [[amount, currency], ...]` becomes `balance: amount` plus `currency`.
 */
function flattenBalance(record: NormalizedRecord): void {
  const balance = record.balance;
  if (!Array.isArray(balance)) {
    return;
  }

  const [first] = balance;
  if (!Array.isArray(first) || typeof first[0] !== 'number') {
    delete record.balance;
    return;
  }

  record.balance = first[0];
  if (record.currency === undefined && typeof first[1] === 'string') {
    record.currency = first[1];
  }
}
