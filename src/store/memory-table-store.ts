import type { JsonRecord, Page } from '../types';
import { ConfigError, ConflictError, ValidationError } from '../utils/errors';
import type { PutOptions, QueryOptions, TableKey, TableSchema, TableStore } from './table-store';

type Partition = Map<string, JsonRecord>;

/**
 * In-process TableStore. Items are deep-copied on the way in and out so callers
 * never share references with stored state.
 *
 * @example
 * ```typescript
 * const store = new MemoryTableStore({ data: { partitionKey: 'index', sortKey: '_id' } });
 * await store.put('data', { index: 'p:o:r', _id: '1', data: {} });
 * ```
 */
export class MemoryTableStore implements TableStore {
  private readonly tables = new Map<string, Map<string, Partition>>();

  constructor(private readonly schemas: Record<string, TableSchema>) {}

  async get(table: string, key: TableKey): Promise<JsonRecord | undefined> {
    this.schema(table);
    const item = this.tables.get(table)?.get(key.partition)?.get(key.sort);
    return item === undefined ? undefined : structuredClone(item);
  }

  async put(table: string, item: JsonRecord, options: PutOptions = {}): Promise<void> {
    const key = this.keyOf(table, item);
    const partitions = this.tables.get(table) ?? new Map<string, Partition>();
    const partition = partitions.get(key.partition) ?? new Map<string, JsonRecord>();

    if (options.ifNotExists && partition.has(key.sort)) {
      throw new ConflictError(`${table} ${key.partition}/${key.sort}`);
    }

    partition.set(key.sort, structuredClone(item));
    partitions.set(key.partition, partition);
    this.tables.set(table, partitions);
  }

  async delete(table: string, key: TableKey): Promise<boolean> {
    this.schema(table);
    const partition = this.tables.get(table)?.get(key.partition);
    if (!partition) return false;
    const removed = partition.delete(key.sort);
    if (partition.size === 0) this.tables.get(table)?.delete(key.partition);
    return removed;
  }

  async query(table: string, partition: string, options: QueryOptions = {}): Promise<Page<JsonRecord>> {
    this.schema(table);
    const rows = this.tables.get(table)?.get(partition);
    if (!rows) return { items: [] };

    const { beginsWith, startAfter, limit } = options;
    const keys = [...rows.keys()]
      .filter((k) => beginsWith === undefined || k.startsWith(beginsWith))
      .filter((k) => startAfter === undefined || k > startAfter)
      .sort();

    const taken = limit === undefined ? keys : keys.slice(0, limit);
    const items: JsonRecord[] = [];
    for (const k of taken) {
      const item = rows.get(k);
      if (item) items.push(structuredClone(item));
    }

    const last = taken[taken.length - 1];
    return taken.length < keys.length && last !== undefined ? { items, lastKey: last } : { items };
  }

  private schema(table: string): TableSchema {
    const schema = this.schemas[table];
    if (!schema) throw new ConfigError(`Unknown table: ${table}`);
    return schema;
  }

  private keyOf(table: string, item: JsonRecord): TableKey {
    const schema = this.schema(table);
    const partition = item[schema.partitionKey];
    const sort = item[schema.sortKey];
    if (typeof partition !== 'string' || partition.length === 0) {
      throw new ValidationError(`${table} item is missing partition key '${schema.partitionKey}'`);
    }
    if (typeof sort !== 'string' || sort.length === 0) {
      throw new ValidationError(`${table} item is missing sort key '${schema.sortKey}'`);
    }
    return { partition, sort };
  }
}
