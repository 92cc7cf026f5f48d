import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { isMutableTransactionField } from '../domain/entities/Transaction.js';
import { NotFoundError, UnsupportedFieldError } from '../domain/errors.js';
import { fromIsoDate, toIsoDate, type IsoDate, type RawRecord } from '../domain/records.js';
import type { MoneyMoneyBackend } from './MoneyMoneyBackend.js';

const recordList = z.array(z.record(z.unknown()));

const fixtureSchema = z.object({
  accounts: recordList.default([]),
  transactions: z.record(recordList).default({}),
  positions: z.record(recordList).default({}),
  categories: recordList.default([]),
});

export type BackendFixture = z.infer<typeof fixtureSchema>;

export interface BackendCall {
  method: keyof MoneyMoneyBackend;
  args: unknown[];
}

/** Keys MoneyMoney delivers as plist dates */
const DATE_FIELDS = ['bookingDate', 'valueDate', 'tradeTimestamp', 'refreshTimestamp'];

/**
 * Deterministic backend over fixture data.
 *
 * Answers date-range queries by filtering its lists and applies field writes to the
 * stored record in place, so later queries see them. Every call is recorded in `calls`.
 */
export class InMemoryBackend implements MoneyMoneyBackend {
  readonly calls: BackendCall[] = [];

  constructor(private readonly data: BackendFixture) {}

  /**
   * Builds a backend from JSON-shaped data; ISO strings in date fields become Date
   * objects, the way plist decoding delivers them.
   */
  static fromFixture(input: unknown): InMemoryBackend {
    const fixture = fixtureSchema.parse(input);
    const revive = (records: RawRecord[]) => records.map(reviveDates);

    return new InMemoryBackend({
      accounts: revive(fixture.accounts),
      categories: revive(fixture.categories),
      transactions: mapValues(fixture.transactions, revive),
      positions: mapValues(fixture.positions, revive),
    });
  }

  static async fromFile(path: string | URL): Promise<InMemoryBackend> {
    const content = await readFile(path, 'utf8');
    return InMemoryBackend.fromFixture(JSON.parse(content));
  }

  async getAccounts(): Promise<RawRecord[]> {
    this.calls.push({ method: 'getAccounts', args: [] });
    return this.data.accounts;
  }

  async getTransactions(accountNumber: string, startDate: IsoDate, endDate: IsoDate | null): Promise<RawRecord[]> {
    this.calls.push({ method: 'getTransactions', args: [accountNumber, startDate, endDate] });
    const transactions = this.data.transactions[accountNumber] ?? [];

    return transactions.filter((transaction) => {
      const date = transactionDate(transaction);
      if (date === null) {
        return false;
      }
      return date >= startDate && (endDate === null || date <= endDate);
    });
  }

  async getPositions(accountNumber: string): Promise<RawRecord[]> {
    this.calls.push({ method: 'getPositions', args: [accountNumber] });
    return this.data.positions[accountNumber] ?? [];
  }

  async getCategories(): Promise<RawRecord[]> {
    this.calls.push({ method: 'getCategories', args: [] });
    return this.data.categories;
  }

  async setTransactionField(transactionId: string, field: string, value: string): Promise<void> {
    this.calls.push({ method: 'setTransactionField', args: [transactionId, field, value] });
    if (!isMutableTransactionField(field)) {
      throw new UnsupportedFieldError(field);
    }

    for (const transactions of Object.values(this.data.transactions)) {
      const transaction = transactions.find((candidate) => String(candidate.id) === transactionId);
      if (transaction) {
        transaction[field] = field === 'checkmark' ? value === 'on' : value;
        return;
      }
    }

    throw new NotFoundError('Transaction', transactionId);
  }

  /** Number of recorded calls, optionally for one method */
  callCount(method?: keyof MoneyMoneyBackend): number {
    return method ? this.calls.filter((call) => call.method === method).length : this.calls.length;
  }
}

function transactionDate(transaction: RawRecord): IsoDate | null {
  const value = transaction.bookingDate ?? transaction.valueDate;
  return value instanceof Date ? toIsoDate(value) : null;
}

function reviveDates(record: RawRecord): RawRecord {
  const revived: RawRecord = { ...record };
  for (const field of DATE_FIELDS) {
    const value = revived[field];
    if (typeof value !== 'string') {
      continue;
    }
    const date = fromIsoDate(value) ?? new Date(value);
    if (!Number.isNaN(date.getTime())) {
      revived[field] = date;
    }
  }
  return revived;
}

function mapValues<T, U>(source: Record<string, T>, fn: (value: T) => U): Record<string, U> {
  return Object.fromEntries(Object.entries(source).map(([key, value]) => [key, fn(value)]));
}
