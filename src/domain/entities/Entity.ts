import { UnknownAttributeError } from '../errors.js';
import { normalizeRecord } from '../normalizeRecord.js';
import type { NormalizedRecord, RawRecord } from '../records.js';

/**
 * Declared attribute set of one entity kind
 */
export interface EntitySchema {
  name: string;
  attributes: readonly string[];
  /** Raw keys dropped during normalization */
  ignored?: readonly string[];
}

export function normalizeFor(schema: EntitySchema, raw: RawRecord): NormalizedRecord {
  return normalizeRecord(raw, {
    entity: schema.name,
    attributes: schema.attributes,
    ignored: schema.ignored,
  });
}

/**
 * Typed view over a normalized record.
 *
 * `get()` separates the two ways a field can be missing: a name the entity does
 * not declare throws UnknownAttributeError, a declared field without a value is null.
 */
export abstract class Entity {
  protected constructor(
    protected readonly schema: EntitySchema,
    protected readonly data: NormalizedRecord
  ) {}

  get(name: string): unknown {
    if (!this.schema.attributes.includes(name)) {
      throw new UnknownAttributeError(this.schema.name, name);
    }
    return this.data[name] ?? null;
  }

  has(name: string): boolean {
    return this.get(name) !== null;
  }

  toJSON(): NormalizedRecord {
    return { ...this.data };
  }

  protected string(name: string): string | null {
    const value = this.get(name);
    if (typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number') {
      return String(value);
    }
    return null;
  }

  protected number(name: string): number | null {
    const value = this.get(name);
    return typeof value === 'number' ? value : null;
  }

  protected flag(name: string): boolean {
    return this.get(name) === true;
  }
}
