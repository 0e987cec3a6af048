import { Knex } from 'knex';
import type { SpecificationMap } from '../../shared/types';
import { ConcurrencyConflictError } from '../lib/errors';

/** DECIMAL columns arrive from pg as strings. */
export type Decimal = string | number;

export type RowOf<T, K extends keyof T> = Omit<T, K> & {
  [P in K]: null extends T[P] ? Decimal | null : Decimal;
};

export class BaseRepository {
  protected readonly db: Knex | Knex.Transaction;
  protected readonly tableName: string;

  constructor(db: Knex | Knex.Transaction, tableName: string) {
    this.db = db;
    this.tableName = tableName;
  }

  protected get table() {
    return this.db(this.tableName);
  }

  protected now() {
    return this.db.fn.now();
  }

  /**
   * Conditional update on `version`. Zero affected rows means another writer
   * got there first.
   */
  protected async updateVersioned<TRow>(
    entity: string,
    id: string,
    expectedVersion: number,
    patch: object
  ): Promise<TRow> {
    const [row]: TRow[] = await this.table
      .where({ id, version: expectedVersion })
      .update({ ...patch, version: expectedVersion + 1, updated_at: this.now() })
      .returning('*');

    if (!row) {
      throw new ConcurrencyConflictError(entity, id);
    }
    return row;
  }
}

export function jsonMap(value: SpecificationMap | string | null | undefined): SpecificationMap {
  if (!value) return {};
  if (typeof value === 'string') {
    const parsed: unknown = JSON.parse(value);
    return isSpecificationMap(parsed) ? parsed : {};
  }
  return value;
}

export function isSpecificationMap(value: unknown): value is SpecificationMap {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (v) =>
      v === null ||
      typeof v === 'string' ||
      typeof v === 'number' ||
      typeof v === 'boolean' ||
      isSpecificationMap(v)
  );
}
