import { Inject } from '@nestjs/common';
import { TableName } from './tables';

/**
 * Columns every table carries. Column names follow the PascalCase convention
 * used across the schema.
 */
export interface Row {
  Id: string;
  CreatedAt: string;
  UpdatedAt: string;
}

export type NewRow<T extends Row> = Omit<T, 'Id' | 'CreatedAt' | 'UpdatedAt'> &
  Partial<Pick<T, 'Id' | 'CreatedAt' | 'UpdatedAt'>>;

export type RowPatch<T extends Row> = Partial<Omit<T, 'Id' | 'CreatedAt'>>;

type StringColumns<T> = { [K in keyof T]-?: NonNullable<T[K]> extends string ? K : never }[keyof T] & string;

export interface FilterCriteria<T extends Row> {
  /** Column equality; `null` matches NULL. */
  where?: Partial<T>;
  /** Case-insensitive substring match. */
  contains?: Partial<Record<StringColumns<T>, string>>;
  startsWith?: Partial<Record<StringColumns<T>, string>>;
  in?: { [K in keyof T]?: ReadonlyArray<T[K]> };
  /** Strictly less than (ISO timestamps compare lexically). */
  before?: Partial<Record<StringColumns<T>, string>>;
}

export interface OrderBy<T extends Row> {
  column: keyof T & string;
  ascending?: boolean;
}

export interface QueryCriteria<T extends Row> extends FilterCriteria<T> {
  orderBy?: OrderBy<T>[];
  /** Zero-based page index, only applied together with `count`. */
  page?: number;
  count?: number;
}

export interface FindResult<T> {
  items: T[];
  total: number;
}

/**
 * CRUD contract shared by every table. Services depend on this class and never
 * on a concrete backend.
 */
export abstract class EntityRepository<T extends Row> {
  abstract readonly table: TableName;

  abstract findById(id: string): Promise<T | null>;
  abstract findOne(where: Partial<T>): Promise<T | null>;
  abstract findAll(criteria?: QueryCriteria<T>): Promise<FindResult<T>>;
  abstract count(filter?: FilterCriteria<T>): Promise<number>;
  abstract insert(row: NewRow<T>): Promise<T>;
  abstract insertMany(rows: NewRow<T>[]): Promise<T[]>;
  /** @throws EntityNotFoundException when no row has the id. */
  abstract update(id: string, patch: RowPatch<T>): Promise<T>;
  abstract updateWhere(filter: FilterCriteria<T>, patch: RowPatch<T>): Promise<number>;
  abstract delete(id: string): Promise<void>;
  abstract deleteWhere(filter: FilterCriteria<T>): Promise<number>;

  async list(criteria?: QueryCriteria<T>): Promise<T[]> {
    const { items } = await this.findAll(criteria);
    return items;
  }
}

export function repositoryToken(table: TableName): string {
  return `${table}Repository`;
}

export const InjectRepository = (table: TableName): ParameterDecorator => Inject(repositoryToken(table));
