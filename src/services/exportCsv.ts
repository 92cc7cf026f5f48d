import type { Transaction } from '../domain/entities/Transaction.js';

export const CSV_FIELDS = [
  'account',
  'id',
  'accountNumber',
  'bankCode',
  'booked',
  'amount',
  'currency',
  'name',
  'bookingText',
  'purpose',
  'endToEndReference',
  'creditorId',
  'mandateReference',
  'bookingDate',
  'valueDate',
  'checkmark',
] as const;

function escapeCsv(value: unknown): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function csvRow(transaction: Transaction): string {
  return CSV_FIELDS.map((field) =>
    escapeCsv(field === 'account' ? transaction.account.name : transaction.get(field))
  ).join(',');
}

/**
 * Renders transactions as CSV, one header line plus one line per transaction.
 */
export async function exportTransactionsCsv(transactions: AsyncIterable<Transaction>): Promise<string> {
  const lines: string[] = [CSV_FIELDS.join(',')];
  for await (const transaction of transactions) {
    lines.push(csvRow(transaction));
  }
  return lines.join('\n') + '\n';
}
