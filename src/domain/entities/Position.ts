import type { NormalizedRecord, RawRecord } from '../records.js';
import type { Account } from './Account.js';
import { Entity, normalizeFor, type EntitySchema } from './Entity.js';

export const POSITION_SCHEMA = {
  name: 'Position',
  attributes: [
    'id',
    'name',
    'isin',
    'market',
    'type',
    'price',
    'purchasePrice',
    'quantity',
    'amount',
    'currencyOfPrice',
    'currencyOfAmount',
    'currencyOfProfit',
    'absoluteProfit',
    'relativeProfit',
    'tradeTimestamp',
  ],
} as const satisfies EntitySchema;

/**
 * Security held in a portfolio account (read-only)
 */
export class Position extends Entity {
  constructor(
    data: NormalizedRecord,
    readonly account: Account
  ) {
    super(POSITION_SCHEMA, data);
  }

  static fromRaw(raw: RawRecord, account: Account): Position {
    return new Position(normalizeFor(POSITION_SCHEMA, raw), account);
  }

  get name(): string | null {
    return this.string('name');
  }

  get isin(): string | null {
    return this.string('isin');
  }

  get market(): string | null {
    return this.string('market');
  }

  get type(): string | null {
    return this.string('type');
  }

  get price(): number | null {
    return this.number('price');
  }

  get purchasePrice(): number | null {
    return this.number('purchasePrice');
  }

  get quantity(): number | null {
    return this.number('quantity');
  }

  get amount(): number | null {
    return this.number('amount');
  }

  get currencyOfPrice(): string | null {
    return this.string('currencyOfPrice');
  }

  get currencyOfAmount(): string | null {
    return this.string('currencyOfAmount');
  }

  get absoluteProfit(): number | null {
    return this.number('absoluteProfit');
  }

  get relativeProfit(): number | null {
    return this.number('relativeProfit');
  }

  get tradeTimestamp(): string | null {
    return this.string('tradeTimestamp');
  }
}
