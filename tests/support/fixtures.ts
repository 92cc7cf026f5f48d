import { daysAgo } from '../../src/domain/records.js';
import type { RawRecord } from '../../src/domain/records.js';
import { InMemoryBackend, type BackendFixture } from '../../src/infra/InMemoryBackend.js';

export interface AccountSeed {
  balance?: number;
  currency?: string;
  portfolio?: boolean;
  group?: boolean;
}

export interface TransactionSeed {
  id: number;
  amount: number;
  name: string;
  currency?: string;
  booked?: boolean;
  checkmark?: boolean;
  category?: string;
  comment?: string;
  /** Booking date relative to today; ignored when bookingDate is set */
  age?: number;
  bookingDate?: string;
  valueDate?: string;
  accountNumber?: string;
  purpose?: string;
}

export interface PositionSeed {
  name: string;
  isin: string;
  quantity: number;
  price: number;
  purchasePrice: number;
  currency?: string;
  tradeTimestamp?: string;
}

/**
 * Builds JSON-shaped backend data the way MoneyMoney exports it.
 */
export class FixtureBuilder {
  private readonly accounts: RawRecord[] = [];
  private readonly transactions: Record<string, RawRecord[]> = {};
  private readonly positions: Record<string, RawRecord[]> = {};
  private readonly categories: RawRecord[] = [];

  addAccount(name: string, accountNumber: string, seed: AccountSeed = {}): this {
    const { balance = 0, currency = 'EUR', portfolio = false, group = false } = seed;
    this.accounts.push({
      name,
      accountNumber,
      bankCode: 'TESTBANK',
      balance: [[balance, currency]],
      portfolio,
      group,
      icon: 'data:icon',
    });
    return this;
  }

  addTransaction(accountNumber: string, seed: TransactionSeed): this {
    const bookingDate = seed.bookingDate ?? daysAgo(seed.age ?? 0);
    const record: RawRecord = {
      id: seed.id,
      amount: seed.amount,
      currency: seed.currency ?? 'EUR',
      name: seed.name,
      booked: seed.booked ?? true,
      checkmark: seed.checkmark ?? false,
      category: seed.category ?? null,
      categoryId: 42,
      comment: seed.comment ?? '',
      bookingDate,
      valueDate: seed.valueDate ?? bookingDate,
      purpose: seed.purpose ?? '',
      bankCode: 'TESTBANK',
    };
    if (seed.accountNumber) {
      record.accountNumber = seed.accountNumber;
    }
    (this.transactions[accountNumber] ??= []).push(record);
    return this;
  }

  addPosition(accountNumber: string, seed: PositionSeed): this {
    const currency = seed.currency ?? 'USD';
    const amount = seed.quantity * seed.price;
    const profit = (seed.price - seed.purchasePrice) * seed.quantity;
    (this.positions[accountNumber] ??= []).push({
      id: `pos_${seed.isin}`,
      name: seed.name,
      isin: seed.isin,
      market: 'NASDAQ',
      type: 'share',
      quantity: seed.quantity,
      price: seed.price,
      purchasePrice: seed.purchasePrice,
      currencyOfPrice: currency,
      amount,
      currencyOfAmount: currency,
      absoluteProfit: profit,
      currencyOfProfit: currency,
      relativeProfit: (profit / (seed.purchasePrice * seed.quantity)) * 100,
      tradeTimestamp: seed.tradeTimestamp ?? daysAgo(1),
    });
    return this;
  }

  addCategory(id: string, name: string, parentId?: string): this {
    this.categories.push({ id, name, parentId: parentId ?? null });
    return this;
  }

  build(): BackendFixture {
    return {
      accounts: this.accounts,
      transactions: this.transactions,
      positions: this.positions,
      categories: this.categories,
    };
  }

  backend(): InMemoryBackend {
    return InMemoryBackend.fromFixture(this.build());
  }
}

/**
 * Two regular accounts, one portfolio and one group row.
 * Exactly two booked and unchecked transactions fall within the last 30 days.
 */
export function sampleFixture(): FixtureBuilder {
  return new FixtureBuilder()
    .addAccount('Banks', '', { group: true })
    .addAccount('Postbank', 'DE001', { balance: 1500 })
    .addAccount('Deutsche Bank', 'DE002', { balance: 320.5 })
    .addAccount('Comdirect', 'DE003', { balance: 5000, portfolio: true })
    .addCategory('cat_income', 'Income')
    .addCategory('cat_expenses', 'Expenses')
    .addCategory('cat_food', 'Food', 'cat_expenses')
    .addTransaction('DE001', {
      id: 1,
      amount: -12.5,
      name: 'Canteen',
      category: 'Food',
      comment: 'Lunch <tag:food> <tag:tax>',
      age: 5,
    })
    .addTransaction('DE001', {
      id: 2,
      amount: 2500,
      name: 'Employer Ltd',
      accountNumber: 'DE89370400440532013000',
      category: 'Income',
      age: 10,
    })
    .addTransaction('DE001', { id: 3, amount: -40, name: 'Pending Shop', booked: false, age: 2 })
    .addTransaction('DE001', { id: 4, amount: -9.99, name: 'Streaming', checkmark: true, age: 3 })
    .addTransaction('DE001', { id: 5, amount: -60, name: 'Old Booking', age: 60 })
    .addTransaction('DE002', { id: 6, amount: -20, name: 'Bakery', checkmark: true, category: 'Food', age: 1 })
    .addPosition('DE003', {
      name: 'Apple Inc.',
      isin: 'US0378331005',
      quantity: 10,
      price: 150,
      purchasePrice: 140,
    })
    .addPosition('DE003', {
      name: 'Microsoft Corp.',
      isin: 'US5949181045',
      quantity: 5,
      price: 300,
      purchasePrice: 280,
    });
}
