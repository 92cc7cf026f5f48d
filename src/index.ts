export { MoneyMoney } from './services/MoneyMoney.js';
export { exportTransactionsCsv, CSV_FIELDS } from './services/exportCsv.js';

export { Account, ACCOUNT_SCHEMA, DEFAULT_TRANSACTION_AGE_DAYS } from './domain/entities/Account.js';
export type { TransactionQuery } from './domain/entities/Account.js';
export {
  Transaction,
  TRANSACTION_SCHEMA,
  MUTABLE_TRANSACTION_FIELDS,
  READ_ONLY_TRANSACTION_FIELDS,
  isMutableTransactionField,
} from './domain/entities/Transaction.js';
export type { TransactionFilter, MutableTransactionField } from './domain/entities/Transaction.js';
export { Position, POSITION_SCHEMA } from './domain/entities/Position.js';
export { Category, CATEGORY_SCHEMA } from './domain/entities/Category.js';
export { Entity } from './domain/entities/Entity.js';
export type { EntitySchema } from './domain/entities/Entity.js';
export { TaggedComment, parseComment, renderComment } from './domain/TaggedComment.js';
export type { ParsedComment } from './domain/TaggedComment.js';
export { normalizeRecord, SENTINEL_DATE } from './domain/normalizeRecord.js';
export type { NormalizeOptions } from './domain/normalizeRecord.js';
export type { IsoDate, RawRecord, NormalizedRecord } from './domain/records.js';
export * from './domain/errors.js';

export type { MoneyMoneyBackend } from './infra/MoneyMoneyBackend.js';
export { MoneyMoneyAdapter } from './infra/MoneyMoneyAdapter.js';
export type { MoneyMoneyAdapterConfig } from './infra/MoneyMoneyAdapter.js';
export { InMemoryBackend } from './infra/InMemoryBackend.js';
export type { BackendFixture, BackendCall } from './infra/InMemoryBackend.js';
export { validateEnv } from './infra/env.js';
export type { Env } from './infra/env.js';
export { createLogger, setLogger } from './infra/logger.js';
