import { v4 as uuidv4 } from 'uuid';
import { DuplicateEntityException, EntityNotFoundException } from '../errors/service.exception';
import {
  EntityRepository,
  FilterCriteria,
  FindResult,
  NewRow,
  QueryCriteria,
  Row,
  RowPatch,
} from './entity-repository';
import { TableName, UNIQUE_KEYS } from './tables';

type Cell = unknown;

function compareCells(a: Cell, b: Cell): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;
}

/**
 * Process-local table. Backs `PERSISTENCE=memory` and the unit tests; mirrors
 * the unique constraints of the SQL schema.
 */
export class InMemoryEntityRepository<T extends Row> extends EntityRepository<T> {
  private readonly rows = new Map<string, T>();

  constructor(
    readonly table: TableName,
    private readonly uniqueKeys: string[][] = UNIQUE_KEYS[table],
  ) {
    super();
  }

  async findById(id: string): Promise<T | null> {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  async findOne(where: Partial<T>): Promise<T | null> {
    const match = this.filter({ where })[0];
    return match ? structuredClone(match) : null;
  }

  async findAll(criteria: QueryCriteria<T> = {}): Promise<FindResult<T>> {
    let matches = this.filter(criteria);
    const orderBy = criteria.orderBy ?? [];
    if (orderBy.length > 0) {
      matches = [...matches].sort((a, b) => {
        for (const { column, ascending = true } of orderBy) {
          const result = compareCells(a[column], b[column]);
          if (result !== 0) return ascending ? result : -result;
        }
        return 0;
      });
    }
    const total = matches.length;
    if (criteria.count !== undefined) {
      const start = (criteria.page ?? 0) * criteria.count;
      matches = matches.slice(start, start + criteria.count);
    }
    return { items: matches.map((row) => structuredClone(row)), total };
  }

  async count(filter: FilterCriteria<T> = {}): Promise<number> {
    return this.filter(filter).length;
  }

  async insert(row: NewRow<T>): Promise<T> {
    const [inserted] = await this.insertMany([row]);
    return inserted;
  }

  async insertMany(rows: NewRow<T>[]): Promise<T[]> {
    const now = new Date().toISOString();
    const created: T[] = [];
    for (const row of rows) {
      const record = { CreatedAt: now, UpdatedAt: now, ...row, Id: row.Id ?? uuidv4() } as T;
      this.assertUnique(record, [...this.rows.values(), ...created]);
      created.push(record);
    }
    for (const record of created) {
      this.rows.set(record.Id, record);
    }
    return created.map((record) => structuredClone(record));
  }

  async update(id: string, patch: RowPatch<T>): Promise<T> {
    const existing = this.rows.get(id);
    if (!existing) {
      throw new EntityNotFoundException(this.table, id);
    }
    const updated: T = { ...existing, UpdatedAt: new Date().toISOString() };
    // Undefined columns are left untouched, as they are when serialised for PostgREST.
    for (const [column, value] of Object.entries(patch)) {
      if (value !== undefined && column !== 'Id') Reflect.set(updated, column, value);
    }
    this.assertUnique(updated, [...this.rows.values()].filter((row) => row.Id !== id));
    this.rows.set(id, updated);
    return structuredClone(updated);
  }

  async updateWhere(filter: FilterCriteria<T>, patch: RowPatch<T>): Promise<number> {
    const matches = this.filter(filter);
    for (const row of matches) {
      await this.update(row.Id, patch);
    }
    return matches.length;
  }

  async delete(id: string): Promise<void> {
    this.rows.delete(id);
  }

  async deleteWhere(filter: FilterCriteria<T>): Promise<number> {
    const matches = this.filter(filter);
    for (const row of matches) {
      this.rows.delete(row.Id);
    }
    return matches.length;
  }

  private filter(criteria: FilterCriteria<T>): T[] {
    return [...this.rows.values()].filter((row) => this.matches(row, criteria));
  }

  private matches(row: T, criteria: FilterCriteria<T>): boolean {
    const cells = new Map<string, Cell>(Object.entries(row));
    for (const [column, expected] of Object.entries(criteria.where ?? {})) {
      if (expected === undefined) continue;
      const actual = cells.get(column);
      if (expected === null ? actual !== null && actual !== undefined : actual !== expected) return false;
    }
    for (const [column, fragment] of Object.entries(criteria.contains ?? {})) {
      const actual = cells.get(column);
      if (typeof fragment !== 'string') continue;
      if (typeof actual !== 'string' || !actual.toLowerCase().includes(fragment.toLowerCase())) return false;
    }
    for (const [column, prefix] of Object.entries(criteria.startsWith ?? {})) {
      const actual = cells.get(column);
      if (typeof prefix !== 'string') continue;
      if (typeof actual !== 'string' || !actual.startsWith(prefix)) return false;
    }
    for (const [column, values] of Object.entries(criteria.in ?? {})) {
      if (!Array.isArray(values)) continue;
      if (!values.includes(cells.get(column))) return false;
    }
    for (const [column, bound] of Object.entries(criteria.before ?? {})) {
      const actual = cells.get(column);
      if (typeof bound !== 'string') continue;
      if (actual === null || actual === undefined || !(String(actual) < bound)) return false;
    }
    return true;
  }

  private assertUnique(record: T, others: T[]): void {
    const cells = new Map<string, Cell>(Object.entries(record));
    for (const columns of this.uniqueKeys) {
      const values = columns.map((column) => cells.get(column));
      if (values.some((value) => value === null || value === undefined)) continue;
      const clash = others.some((other) => {
        const otherCells = new Map<string, Cell>(Object.entries(other));
        return columns.every((column, index) => otherCells.get(column) === values[index]);
      });
      if (clash) {
        throw new DuplicateEntityException(this.table, values.map(String).join('/'));
      }
    }
  }
}
