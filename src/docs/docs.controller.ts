import type { StoredFile, StoredFileWithBody } from '../types';
import type { BlobStore, StoredBlob } from '../store';
import type { Clock } from '../utils/date-utils';
import { toIso, utcClock } from '../utils/date-utils';
import { NotFoundError } from '../utils/errors';
import { Logger } from '../utils/logger';
import type { ControllerOptions, IdGenerator } from '../utils/runtime';
import { uuidGenerator } from '../utils/runtime';
import { validateKeySegment, validateString } from '../utils/validation';

const EXTENSIONS: Record<string, string> = {
  'application/json': '.json',
  'text/plain': '.txt',
  'text/html': '.html',
  'text/csv': '.csv',
};

export function extensionFor(contentType: string): string {
  const base = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return EXTENSIONS[base] ?? '';
}

export type DocsControllerOptions = ControllerOptions & {
  /** Public base URL files are served from; without it `url` is the bare path. */
  baseUrl?: string;
};

/**
 * File storage scoped like ring data: `<portfolio>/<org>/<ring>/<name>`. The ring
 * part may nest folders (`schd_runs/2026-10-19`).
 */
export class DocsController {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly newId: IdGenerator;
  private readonly baseUrl?: string;

  constructor(
    private readonly store: BlobStore,
    options: DocsControllerOptions = {},
  ) {
    this.logger = (options.logger ?? new Logger('silent')).child('docs');
    this.clock = options.clock ?? utcClock;
    this.newId = options.idGenerator ?? uuidGenerator;
    this.baseUrl = options.baseUrl?.replace(/\/+$/, '');
  }

  /**
   * Store a file body. The name defaults to a fresh id plus an extension derived
   * from the content type.
   *
   * @example
   * ```typescript
   * const file = await docs.postFile('p', 'o', 'schd_runs/2026-10-19', '{"ok":true}', 'application/json');
   * // file.path === 'p/o/schd_runs/2026-10-19/<id>.json'
   * ```
   */
  async postFile(
    portfolio: string,
    org: string,
    ring: string,
    body: string,
    contentType: string,
    options: { isPublic?: boolean; name?: string } = {},
  ): Promise<StoredFile> {
    const folder = this.folder(portfolio, org, ring);
    const name = validateKeySegment(options.name ?? `${this.newId()}${extensionFor(contentType)}`, 'File name');
    const path = `${folder}/${name}`;
    const meta = {
      contentType: validateString(contentType, 'Content type'),
      isPublic: options.isPublic ?? false,
      added: toIso(this.clock()),
    };

    await this.store.put(path, body, meta);
    this.logger.info('File stored', { path, contentType: meta.contentType, isPublic: meta.isPublic });
    return this.describe({ path, body, ...meta });
  }

  /**
   * @throws NotFoundError if nothing is stored at `path`
   */
  async getFile(path: string): Promise<StoredFileWithBody> {
    const blob = await this.store.get(validateString(path, 'Path'));
    if (!blob) throw new NotFoundError(`file ${path}`);
    return { ...this.describe(blob), body: blob.body };
  }

  /** Paths of every file under the ring folder, ascending. */
  async listFiles(portfolio: string, org: string, ring: string): Promise<string[]> {
    return this.store.list(`${this.folder(portfolio, org, ring)}/`);
  }

  async deleteFile(path: string): Promise<void> {
    const removed = await this.store.delete(validateString(path, 'Path'));
    if (!removed) throw new NotFoundError(`file ${path}`);
    this.logger.info('File deleted', { path });
  }

  private folder(portfolio: string, org: string, ring: string): string {
    const ringParts = validateString(ring, 'Ring').split('/').map((part) => validateKeySegment(part, 'Ring folder'));
    return [validateKeySegment(portfolio, 'Portfolio'), validateKeySegment(org, 'Org'), ...ringParts].join('/');
  }

  private describe(blob: StoredBlob): StoredFile {
    return {
      path: blob.path,
      url: this.baseUrl ? `${this.baseUrl}/${blob.path}` : blob.path,
      contentType: blob.contentType,
      isPublic: blob.isPublic,
      size: Buffer.byteLength(blob.body, 'utf8'),
      added: blob.added,
    };
  }
}
