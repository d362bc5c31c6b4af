export type BlobMeta = {
  contentType: string;
  isPublic: boolean;
  added: string; // UTC ISO
};

export type StoredBlob = BlobMeta & {
  path: string;
  body: string;
};

/** Flat path-addressed file storage. */
export interface BlobStore {
  put(path: string, body: string, meta: BlobMeta): Promise<void>;
  get(path: string): Promise<StoredBlob | undefined>;
  /** Paths starting with `prefix`, ascending. */
  list(prefix: string): Promise<string[]>;
  delete(path: string): Promise<boolean>;
}

export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, StoredBlob>();

  async put(path: string, body: string, meta: BlobMeta): Promise<void> {
    this.blobs.set(path, { path, body, ...meta });
  }

  async get(path: string): Promise<StoredBlob | undefined> {
    const blob = this.blobs.get(path);
    return blob && { ...blob };
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.blobs.keys()].filter((p) => p.startsWith(prefix)).sort();
  }

  async delete(path: string): Promise<boolean> {
    return this.blobs.delete(path);
  }
}
