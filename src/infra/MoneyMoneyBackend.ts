import type { IsoDate, RawRecord } from '../domain/records.js';

/**
 * What the domain layer needs from MoneyMoney.
 * Implementations: MoneyMoneyAdapter (AppleScript), InMemoryBackend (fixtures)
 *
 * Backends return decoded but unnormalized records; normalizeRecord does the rest.
 * Transport failures propagate to the caller untouched.
 */
export interface MoneyMoneyBackend {
  /** Every account, including group headers and portfolios */
  getAccounts(): Promise<RawRecord[]>;

  /** Transactions of one account dated within [startDate, endDate]; open-ended when endDate is null. No ordering guarantee. */
  getTransactions(accountNumber: string, startDate: IsoDate, endDate: IsoDate | null): Promise<RawRecord[]>;

  /** Securities held in a portfolio account */
  getPositions(accountNumber: string): Promise<RawRecord[]>;

  getCategories(): Promise<RawRecord[]>;

  /** Persist one field of one transaction. Rejects unknown ids and fields the backend cannot write. */
  setTransactionField(transactionId: string, field: string, value: string): Promise<void>;
}
