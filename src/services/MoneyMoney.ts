import { Account, type TransactionQuery } from '../domain/entities/Account.js';
import { Category } from '../domain/entities/Category.js';
import type { Transaction } from '../domain/entities/Transaction.js';
import type { RawRecord } from '../domain/records.js';
import { validateEnv } from '../infra/env.js';
import { logger } from '../infra/logger.js';
import { MoneyMoneyAdapter } from '../infra/MoneyMoneyAdapter.js';
import type { MoneyMoneyBackend } from '../infra/MoneyMoneyBackend.js';

/**
 * Entry point to one MoneyMoney snapshot.
 *
 * Accounts and categories are loaded once by connect() and never refreshed;
 * connect again for fresh data. Transactions and positions are fetched on demand.
 */
export class MoneyMoney {
  private readonly regular: Account[];
  private readonly portfolioAccounts: Account[];

  private constructor(
    readonly backend: MoneyMoneyBackend,
    accounts: Account[],
    private readonly rawCategories: RawRecord[]
  ) {
    this.regular = accounts.filter((account) => !account.isPortfolio);
    this.portfolioAccounts = accounts.filter((account) => account.isPortfolio);
  }

  /**
   * Loads the account and category snapshot. Without a backend, talks to the
   * local MoneyMoney app configured through the environment.
   */
  static async connect(backend?: MoneyMoneyBackend): Promise<MoneyMoney> {
    const source = backend ?? new MoneyMoneyAdapter(validateEnv());
    // One backend call at a time; MoneyMoney answers AppleScript requests one by one
    const rawAccounts = await source.getAccounts();
    const rawCategories = await source.getCategories();

    // Group rows are folders in MoneyMoney's sidebar, not accounts
    const accounts = rawAccounts
      .filter((raw) => raw.group !== true)
      .map((raw) => Account.fromRaw(raw, source));

    logger.info('MoneyMoney snapshot loaded', {
      accounts: accounts.length,
      categories: rawCategories.length,
    });
    return new MoneyMoney(source, accounts, rawCategories);
  }

  *accounts(): Generator<Account> {
    yield* this.regular;
  }

  *portfolios(): Generator<Account> {
    yield* this.portfolioAccounts;
  }

  account(name: string): Account | null {
    return this.regular.find((account) => account.name === name) ?? null;
  }

  portfolio(name: string): Account | null {
    return this.portfolioAccounts.find((account) => account.name === name) ?? null;
  }

  /** Matching transactions of every regular account, account by account in snapshot order */
  async *transactions(query: TransactionQuery = {}): AsyncGenerator<Transaction> {
    for (const account of this.regular) {
      yield* account.transactions(query);
    }
  }

  *categories(): Generator<Category> {
    for (const raw of this.rawCategories) {
      yield Category.fromRaw(raw);
    }
  }

  category(name: string): Category | null {
    for (const category of this.categories()) {
      if (category.name === name) {
        return category;
      }
    }
    return null;
  }
}
