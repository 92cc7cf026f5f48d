import type { NormalizedRecord, RawRecord } from '../records.js';
import { Entity, normalizeFor, type EntitySchema } from './Entity.js';

export const CATEGORY_SCHEMA = {
  name: 'Category',
  attributes: ['id', 'uuid', 'name', 'parentId', 'group', 'indentation', 'budget', 'currency', 'default'],
  ignored: ['icon'],
} as const satisfies EntitySchema;

/**
 * MoneyMoney category. parentId links categories into a tree; the link is not validated here.
 */
export class Category extends Entity {
  constructor(data: NormalizedRecord) {
    super(CATEGORY_SCHEMA, data);
  }

  static fromRaw(raw: RawRecord): Category {
    return new Category(normalizeFor(CATEGORY_SCHEMA, raw));
  }

  get id(): string {
    return this.string('id') ?? this.string('uuid') ?? '';
  }

  get name(): string {
    return this.string('name') ?? '';
  }

  get parentId(): string | null {
    return this.string('parentId');
  }

  get isGroup(): boolean {
    return this.flag('group');
  }
}
