#!/usr/bin/env node
import { writeFile } from 'node:fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import type { TransactionQuery } from './domain/entities/Account.js';
import { isAppError } from './domain/errors.js';
import { validateEnv } from './infra/env.js';
import { createLogger, logger, setLogger } from './infra/logger.js';
import { MoneyMoneyAdapter } from './infra/MoneyMoneyAdapter.js';
import { exportTransactionsCsv } from './services/exportCsv.js';
import { MoneyMoney } from './services/MoneyMoney.js';

interface ExportOptions {
  age: number;
  start?: string;
  end?: string;
  account?: string;
  category?: string;
  booked?: boolean;
  unchecked?: boolean;
  output?: string;
}

function parseDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days < 0) {
    throw new InvalidArgumentError('Must be a non-negative whole number of days.');
  }
  return days;
}

async function exportTransactions(options: ExportOptions): Promise<void> {
  dotenv.config();
  const env = validateEnv();
  setLogger(createLogger(env));

  const money = await MoneyMoney.connect(new MoneyMoneyAdapter(env));
  const query: TransactionQuery = {
    age: options.age,
    startDate: options.start,
    endDate: options.end,
    category: options.category,
    booked: options.booked,
    checked: options.unchecked ? false : undefined,
  };

  let transactions = money.transactions(query);
  if (options.account) {
    const account = money.account(options.account);
    if (!account) {
      throw new Error(`No account named "${options.account}"`);
    }
    transactions = account.transactions(query);
  }

  const csv = await exportTransactionsCsv(transactions);
  if (options.output) {
    await writeFile(options.output, csv, 'utf8');
    logger.info('CSV written', { file: options.output });
  } else {
    process.stdout.write(csv);
  }
}

const program = new Command()
  .name('moneymoney-export')
  .description('Export MoneyMoney transactions as CSV')
  .option('--age <days>', 'days to look back when --start is not given', parseDays, 90)
  .option('--start <date>', 'first booking date (YYYY-MM-DD)')
  .option('--end <date>', 'last booking date (YYYY-MM-DD)')
  .option('--account <name>', 'only this account')
  .option('--category <name>', 'only this category')
  .option('--booked', 'only booked transactions')
  .option('--unchecked', 'only transactions without a checkmark')
  .option('-o, --output <file>', 'write to a file instead of stdout')
  .action(exportTransactions);

try {
  await program.parseAsync(process.argv);
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  logger.error('Export failed', {
    error: message,
    code: isAppError(error) ? error.code : undefined,
  });
  process.exitCode = 1;
}
