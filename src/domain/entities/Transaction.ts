import { logger } from '../../infra/logger.js';
import { ReadOnlyFieldError, UnknownAttributeError, ValidationError } from '../errors.js';
import type { NormalizedRecord, RawRecord } from '../records.js';
import { TaggedComment } from '../TaggedComment.js';
import type { Account } from './Account.js';
import { Entity, normalizeFor, type EntitySchema } from './Entity.js';

export const TRANSACTION_SCHEMA = {
  name: 'Transaction',
  attributes: [
    'id',
    'accountNumber',
    'accountUuid',
    'amount',
    'currency',
    'name',
    'booked',
    'checkmark',
    'category',
    'comment',
    'bookingDate',
    'valueDate',
    'bankCode',
    'creditorId',
    'mandateReference',
    'endToEndReference',
    'purpose',
    'bookingText',
    'type',
  ],
  ignored: ['categoryId'],
} as const satisfies EntitySchema;

export const READ_ONLY_TRANSACTION_FIELDS: readonly string[] = ['id'];
export const MUTABLE_TRANSACTION_FIELDS = ['checkmark', 'comment', 'category'] as const;

export type MutableTransactionField = (typeof MUTABLE_TRANSACTION_FIELDS)[number];

/** Criteria left undefined are not checked */
export interface TransactionFilter {
  booked?: boolean;
  checked?: boolean;
  category?: string;
}

const MUTABLE_FIELD_SET: ReadonlySet<string> = new Set(MUTABLE_TRANSACTION_FIELDS);

export function isMutableTransactionField(name: string): name is MutableTransactionField {
  return MUTABLE_FIELD_SET.has(name);
}

/**
 * One booking of a regular account.
 *
 * Only `checkmark`, `comment` and `category` can change, always through the
 * account's backend; the local copy is updated after the backend call resolves.
 * Tags live inside `comment` and are re-parsed on every read.
 */
export class Transaction extends Entity {
  constructor(
    data: NormalizedRecord,
    readonly account: Account
  ) {
    super(TRANSACTION_SCHEMA, data);
  }

  static fromRaw(raw: RawRecord, account: Account): Transaction {
    return new Transaction(normalizeFor(TRANSACTION_SCHEMA, raw), account);
  }

  get id(): string {
    return this.string('id') ?? '';
  }

  get amount(): number | null {
    return this.number('amount');
  }

  get currency(): string | null {
    return this.string('currency');
  }

  get name(): string | null {
    return this.string('name');
  }

  /** Counterparty account number, or its name when MoneyMoney has no number */
  get payee(): string | null {
    return this.string('accountNumber') ?? this.name;
  }

  get booked(): boolean {
    return this.flag('booked');
  }

  get checkmark(): boolean {
    return this.flag('checkmark');
  }

  get category(): string | null {
    return this.string('category');
  }

  get comment(): string {
    return this.string('comment') ?? '';
  }

  get bookingDate(): string | null {
    return this.string('bookingDate');
  }

  get valueDate(): string | null {
    return this.string('valueDate');
  }

  get purpose(): string | null {
    return this.string('purpose');
  }

  get bookingText(): string | null {
    return this.string('bookingText');
  }

  get bankCode(): string | null {
    return this.string('bankCode');
  }

  get creditorId(): string | null {
    return this.string('creditorId');
  }

  get mandateReference(): string | null {
    return this.string('mandateReference');
  }

  get endToEndReference(): string | null {
    return this.string('endToEndReference');
  }

  get tags(): ReadonlySet<string> {
    return TaggedComment.parse(this.comment).tags;
  }

  /** Comment without its tag markers */
  get text(): string {
    return TaggedComment.parse(this.comment).text;
  }

  passFilter(filter: TransactionFilter = {}): boolean {
    const { booked, checked, category } = filter;
    if (booked !== undefined && this.booked !== booked) {
      return false;
    }
    if (checked !== undefined && this.checkmark !== checked) {
      return false;
    }
    if (category !== undefined && this.category !== category) {
      return false;
    }
    return true;
  }

  async setCheckmark(value: boolean): Promise<void> {
    if (this.checkmark === value) {
      return;
    }
    await this.write('checkmark', value ? 'on' : 'off');
  }

  async addTags(tag: string, ...more: string[]): Promise<void> {
    const comment = TaggedComment.parse(this.comment);
    for (const name of [tag, ...more]) {
      comment.add(name);
    }
    if (comment.changed) {
      await this.write('comment', comment.render());
    }
  }

  async removeTags(tag: string, ...more: string[]): Promise<void> {
    const comment = TaggedComment.parse(this.comment);
    for (const name of [tag, ...more]) {
      comment.remove(name);
    }
    if (comment.changed) {
      await this.write('comment', comment.render());
    }
  }

  /** Replaces the free text of the comment and keeps its tags */
  async setComment(text: string): Promise<void> {
    const comment = TaggedComment.parse(this.comment);
    const next = comment.withText(text).render();
    if (next !== this.comment) {
      await this.write('comment', next);
    }
  }

  async setCategory(category: string): Promise<void> {
    if (this.category === category) {
      return;
    }
    await this.write('category', category);
  }

  async setField(name: string, value: string): Promise<void> {
    if (!this.schema.attributes.includes(name)) {
      throw new UnknownAttributeError(this.schema.name, name);
    }
    if (READ_ONLY_TRANSACTION_FIELDS.includes(name) || !isMutableTransactionField(name)) {
      throw new ReadOnlyFieldError(this.schema.name, name);
    }
    if (name === 'checkmark' && value !== 'on' && value !== 'off') {
      throw new ValidationError('checkmark must be "on" or "off"', { value });
    }
    await this.write(name, value);
  }

  private async write(field: MutableTransactionField, value: string): Promise<void> {
    await this.account.backend.setTransactionField(this.id, field, value);
    this.data[field] = field === 'checkmark' ? value === 'on' : value;
    logger.debug('Transaction updated', { transactionId: this.id, field });
  }
}
