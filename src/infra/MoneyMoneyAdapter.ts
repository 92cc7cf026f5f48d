import plist from 'plist';
import { z } from 'zod';
import { isMutableTransactionField } from '../domain/entities/Transaction.js';
import { MoneyMoneyError, UnsupportedFieldError, ValidationError } from '../domain/errors.js';
import type { IsoDate, RawRecord } from '../domain/records.js';
import { createAppleScriptRunner, quoteAppleScript, type AppleScriptRunner } from './appleScript.js';
import type { Env } from './env.js';
import { logger } from './logger.js';
import type { MoneyMoneyBackend } from './MoneyMoneyBackend.js';

const recordList = z.array(z.record(z.unknown()));

const transactionExportSchema = z.object({ transactions: recordList }).passthrough();
const portfolioExportSchema = z.object({ portfolio: recordList }).passthrough();

const TRANSACTION_ID_PATTERN = /^\d+$/;

export type MoneyMoneyAdapterConfig = Pick<Env, 'MONEYMONEY_APP_NAME' | 'MONEYMONEY_TIMEOUT_MS' | 'OSASCRIPT_PATH'>;

/**
 * MoneyMoney backend driven through AppleScript.
 * Every call is one osascript round-trip; exports come back as plist and are validated with zod.
 */
export class MoneyMoneyAdapter implements MoneyMoneyBackend {
  private readonly run: AppleScriptRunner;
  private readonly app: string;

  constructor(config: MoneyMoneyAdapterConfig, runner?: AppleScriptRunner) {
    this.app = config.MONEYMONEY_APP_NAME;
    this.run =
      runner ??
      createAppleScriptRunner({
        osascriptPath: config.OSASCRIPT_PATH,
        timeoutMs: config.MONEYMONEY_TIMEOUT_MS,
      });
  }

  async getAccounts(): Promise<RawRecord[]> {
    const accounts = await this.export('export accounts', recordList);
    logger.info('Retrieved accounts', { count: accounts.length });
    return accounts;
  }

  async getTransactions(accountNumber: string, startDate: IsoDate, endDate: IsoDate | null): Promise<RawRecord[]> {
    let command = `export transactions from account ${quoteAppleScript(accountNumber)} from date ${quoteAppleScript(startDate)}`;
    if (endDate) {
      command += ` to date ${quoteAppleScript(endDate)}`;
    }
    command += ' as "plist"';

    const { transactions } = await this.export(command, transactionExportSchema);
    logger.info('Retrieved transactions', { count: transactions.length, startDate, endDate });
    return transactions;
  }

  async getPositions(accountNumber: string): Promise<RawRecord[]> {
    const { portfolio } = await this.export(
      `export portfolio from account ${quoteAppleScript(accountNumber)} as "plist"`,
      portfolioExportSchema
    );
    logger.info('Retrieved positions', { count: portfolio.length });
    return portfolio;
  }

  async getCategories(): Promise<RawRecord[]> {
    const categories = await this.export('export categories', recordList);
    logger.info('Retrieved categories', { count: categories.length });
    return categories;
  }

  async setTransactionField(transactionId: string, field: string, value: string): Promise<void> {
    if (!isMutableTransactionField(field)) {
      throw new UnsupportedFieldError(field);
    }
    if (!TRANSACTION_ID_PATTERN.test(transactionId)) {
      throw new ValidationError('MoneyMoney transaction ids are numeric', { transactionId });
    }

    await this.tell(`set transaction id ${transactionId} ${field} to ${quoteAppleScript(value)}`);
    logger.info('Transaction field written', { transactionId, field });
  }

  private tell(command: string): Promise<string> {
    logger.debug('Running AppleScript', { command });
    return this.run(`tell application ${quoteAppleScript(this.app)} to ${command}`);
  }

  private async export<T>(command: string, schema: z.ZodType<T>): Promise<T> {
    const output = await this.tell(command);

    let parsed: unknown;
    try {
      parsed = plist.parse(output);
    } catch (error) {
      throw new MoneyMoneyError('MoneyMoney returned malformed plist', {
        command,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new MoneyMoneyError('Unexpected MoneyMoney export shape', {
        command,
        issues: result.error.issues,
      });
    }
    return result.data;
  }
}
