import { Logger } from '@nestjs/common';
import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { SupabaseService } from '../supabase.service';
import {
  DuplicateEntityException,
  EntityNotFoundException,
  PersistenceException,
  ServiceException,
} from '../errors/service.exception';
import {
  EntityRepository,
  FilterCriteria,
  FindResult,
  NewRow,
  QueryCriteria,
  Row,
  RowPatch,
} from './entity-repository';
import { TableName } from './tables';

const UNIQUE_VIOLATION = '23505';

/** The subset of the PostgREST filter builder the repository drives. */
interface FilterableQuery<Self> {
  eq(column: string, value: unknown): Self;
  is(column: string, value: null): Self;
  ilike(column: string, pattern: string): Self;
  like(column: string, pattern: string): Self;
  in(column: string, values: unknown[]): Self;
  lt(column: string, value: unknown): Self;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class SupabaseEntityRepository<T extends Row> extends EntityRepository<T> {
  private readonly logger: Logger;

  constructor(
    private readonly supabaseService: SupabaseService,
    readonly table: TableName,
  ) {
    super();
    this.logger = new Logger(`SupabaseRepository:${table}`);
  }

  private getSupabaseClient(): SupabaseClient {
    return this.supabaseService.getServiceClient();
  }

  async findById(id: string): Promise<T | null> {
    const { data, error } = await this.getSupabaseClient().from(this.table).select('*').eq('Id', id).maybeSingle();
    if (error) {
      throw this.translate(error, 'find');
    }
    return data as T | null;
  }

  async findOne(where: Partial<T>): Promise<T | null> {
    const query = this.getSupabaseClient().from(this.table).select('*');
    const { data, error } = await this.applyFilter(query, { where }).limit(1).maybeSingle();
    if (error) {
      throw this.translate(error, 'find');
    }
    return data as T | null;
  }

  async findAll(criteria: QueryCriteria<T> = {}): Promise<FindResult<T>> {
    let query = this.applyFilter(this.getSupabaseClient().from(this.table).select('*', { count: 'exact' }), criteria);
    for (const { column, ascending = true } of criteria.orderBy ?? []) {
      query = query.order(column, { ascending, nullsFirst: false });
    }
    if (criteria.count !== undefined) {
      const from = (criteria.page ?? 0) * criteria.count;
      query = query.range(from, from + criteria.count - 1);
    }

    const { data, error, count } = await query;
    if (error) {
      throw this.translate(error, 'list');
    }
    const items = (data ?? []) as T[];
    return { items, total: count ?? items.length };
  }

  async count(filter: FilterCriteria<T> = {}): Promise<number> {
    const query = this.getSupabaseClient().from(this.table).select('Id', { count: 'exact', head: true });
    const { error, count } = await this.applyFilter(query, filter);
    if (error) {
      throw this.translate(error, 'count');
    }
    return count ?? 0;
  }

  async insert(row: NewRow<T>): Promise<T> {
    const { data, error } = await this.getSupabaseClient().from(this.table).insert(row).select().single();
    if (error || !data) {
      throw this.translate(error, 'insert');
    }
    return data as T;
  }

  async insertMany(rows: NewRow<T>[]): Promise<T[]> {
    if (rows.length === 0) {
      return [];
    }
    const { data, error } = await this.getSupabaseClient().from(this.table).insert(rows).select();
    if (error) {
      throw this.translate(error, 'insert');
    }
    return (data ?? []) as T[];
  }

  async update(id: string, patch: RowPatch<T>): Promise<T> {
    const { data, error } = await this.getSupabaseClient()
      .from(this.table)
      .update({ ...patch, UpdatedAt: new Date().toISOString() })
      .eq('Id', id)
      .select()
      .maybeSingle();
    if (error) {
      throw this.translate(error, 'update');
    }
    if (!data) {
      throw new EntityNotFoundException(this.table, id);
    }
    return data as T;
  }

  async updateWhere(filter: FilterCriteria<T>, patch: RowPatch<T>): Promise<number> {
    const query = this.getSupabaseClient()
      .from(this.table)
      .update({ ...patch, UpdatedAt: new Date().toISOString() }, { count: 'exact' });
    const { error, count } = await this.applyFilter(query, filter);
    if (error) {
      throw this.translate(error, 'update');
    }
    return count ?? 0;
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.getSupabaseClient().from(this.table).delete().eq('Id', id);
    if (error) {
      throw this.translate(error, 'delete');
    }
  }

  async deleteWhere(filter: FilterCriteria<T>): Promise<number> {
    const query = this.getSupabaseClient().from(this.table).delete({ count: 'exact' });
    const { error, count } = await this.applyFilter(query, filter);
    if (error) {
      throw this.translate(error, 'delete');
    }
    return count ?? 0;
  }

  private applyFilter<Q extends FilterableQuery<Q>>(query: Q, filter: FilterCriteria<T>): Q {
    let filtered = query;
    for (const [column, value] of Object.entries(filter.where ?? {})) {
      if (value === undefined) continue;
      filtered = value === null ? filtered.is(column, null) : filtered.eq(column, value);
    }
    for (const [column, fragment] of Object.entries(filter.contains ?? {})) {
      if (typeof fragment === 'string') filtered = filtered.ilike(column, `%${escapeLike(fragment)}%`);
    }
    for (const [column, prefix] of Object.entries(filter.startsWith ?? {})) {
      if (typeof prefix === 'string') filtered = filtered.like(column, `${escapeLike(prefix)}%`);
    }
    for (const [column, values] of Object.entries(filter.in ?? {})) {
      if (Array.isArray(values)) filtered = filtered.in(column, values);
    }
    for (const [column, bound] of Object.entries(filter.before ?? {})) {
      if (typeof bound === 'string') filtered = filtered.lt(column, bound);
    }
    return filtered;
  }

  private translate(error: PostgrestError | null, operation: string): ServiceException {
    if (!error) {
      return new PersistenceException(`${operation} on ${this.table} returned no data`);
    }
    if (error.code === UNIQUE_VIOLATION) {
      return new DuplicateEntityException(this.table, error.details || error.message);
    }
    this.logger.error(`${operation} on ${this.table} failed: ${error.message}`, error.details);
    return new PersistenceException(`Could not ${operation} ${this.table}: ${error.message}`, error);
  }
}
