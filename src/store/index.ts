export type { TableStore, TableSchema, TableKey, PutOptions, QueryOptions } from './table-store';
export { MemoryTableStore } from './memory-table-store';
export type { BlobStore, StoredBlob, BlobMeta } from './blob-store';
export { MemoryBlobStore } from './blob-store';
