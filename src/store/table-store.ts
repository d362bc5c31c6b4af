import type { JsonRecord, Page } from '../types';

/** Names of the partition-key and sort-key attributes of a table. */
export type TableSchema = {
  partitionKey: string;
  sortKey: string;
};

export type TableKey = {
  partition: string;
  sort: string;
};

export type PutOptions = {
  /** Refuse to overwrite an existing item (throws ConflictError). */
  ifNotExists?: boolean;
};

export type QueryOptions = {
  limit?: number;
  /** Exclusive sort key to resume after. */
  startAfter?: string;
  beginsWith?: string;
};

/**
 * Partitioned key/value tables. Items within a partition are ordered by sort key.
 */
export interface TableStore {
  get(table: string, key: TableKey): Promise<JsonRecord | undefined>;
  put(table: string, item: JsonRecord, options?: PutOptions): Promise<void>;
  /** @returns whether an item was removed */
  delete(table: string, key: TableKey): Promise<boolean>;
  query(table: string, partition: string, options?: QueryOptions): Promise<Page<JsonRecord>>;
}
