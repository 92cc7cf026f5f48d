import type { MoneyMoneyBackend } from '../../infra/MoneyMoneyBackend.js';
import { ValidationError } from '../errors.js';
import { daysAgo, isIsoDate, toIsoDate, type IsoDate, type NormalizedRecord, type RawRecord } from '../records.js';
import { Entity, normalizeFor, type EntitySchema } from './Entity.js';
import { Position } from './Position.js';
import { Transaction, type TransactionFilter } from './Transaction.js';

export const ACCOUNT_SCHEMA = {
  name: 'Account',
  attributes: [
    'uuid',
    'name',
    'accountNumber',
    'bankCode',
    'balance',
    'currency',
    'owner',
    'type',
    'portfolio',
    'group',
    'indentation',
    'refreshTimestamp',
  ],
  ignored: ['icon', 'attributes'],
} as const satisfies EntitySchema;

export const DEFAULT_TRANSACTION_AGE_DAYS = 90;

export interface TransactionQuery extends TransactionFilter {
  /** Days to look back when no startDate is given */
  age?: number;
  startDate?: IsoDate | Date;
  /** Open-ended when omitted */
  endDate?: IsoDate | Date;
}

function toQueryDate(value: IsoDate | Date, label: string): IsoDate {
  if (value instanceof Date) {
    return toIsoDate(value);
  }
  if (!isIsoDate(value)) {
    throw new ValidationError(`${label} must be a YYYY-MM-DD date`, { [label]: value });
  }
  return value;
}

/**
 * Account from one MoneyMoney snapshot. Balance is the value reported at load time.
 */
export class Account extends Entity {
  constructor(
    data: NormalizedRecord,
    readonly backend: MoneyMoneyBackend
  ) {
    super(ACCOUNT_SCHEMA, data);
  }

  static fromRaw(raw: RawRecord, backend: MoneyMoneyBackend): Account {
    return new Account(normalizeFor(ACCOUNT_SCHEMA, raw), backend);
  }

  get name(): string {
    return this.string('name') ?? '';
  }

  /** Key MoneyMoney uses to address the account in transaction and portfolio exports */
  get accountNumber(): string {
    return this.string('accountNumber') ?? '';
  }

  get bankCode(): string | null {
    return this.string('bankCode');
  }

  get balance(): number | null {
    return this.number('balance');
  }

  get currency(): string | null {
    return this.string('currency');
  }

  get isPortfolio(): boolean {
    return this.flag('portfolio');
  }

  get isGroup(): boolean {
    return this.flag('group');
  }

  /**
   * Transactions matching the query. Portfolio accounts have none.
   * Each call issues one fresh backend request when iteration starts.
   */
  async *transactions(query: TransactionQuery = {}): AsyncGenerator<Transaction> {
    const { age = DEFAULT_TRANSACTION_AGE_DAYS, startDate, endDate, ...filter } = query;
    if (this.isPortfolio) {
      return;
    }

    const start = startDate !== undefined ? toQueryDate(startDate, 'startDate') : daysAgo(age);
    const end = endDate !== undefined ? toQueryDate(endDate, 'endDate') : null;

    const records = await this.backend.getTransactions(this.accountNumber, start, end);
    for (const raw of records) {
      const transaction = Transaction.fromRaw(raw, this);
      if (transaction.passFilter(filter)) {
        yield transaction;
      }
    }
  }

  /** Securities of a portfolio account; regular accounts have none. */
  async *positions(): AsyncGenerator<Position> {
    if (!this.isPortfolio) {
      return;
    }

    const records = await this.backend.getPositions(this.accountNumber);
    for (const raw of records) {
      yield Position.fromRaw(raw, this);
    }
  }
}
