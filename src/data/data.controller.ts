import type { JsonRecord, Page, PageRequest, RingDoc } from '../types';
import type { TableSchema, TableStore } from '../store';
import type { Clock } from '../utils/date-utils';
import { toIso, utcClock } from '../utils/date-utils';
import { NotFoundError } from '../utils/errors';
import { Logger } from '../utils/logger';
import type { ControllerOptions, IdGenerator } from '../utils/runtime';
import { uuidGenerator } from '../utils/runtime';
import { sanitizeRecord } from '../utils/sanitize';
import { validateJsonRecord, validateKeySegment, validatePositiveInt, validateString } from '../utils/validation';

export const RING_DATA_SCHEMA: TableSchema = { partitionKey: 'index', sortKey: '_id' };

export const DEFAULT_PAGE_LIMIT = 50;

export function ringIndex(portfolio: string, org: string, ring: string): string {
  return `${portfolio}:${org}:${ring}`;
}

export function ringPath(portfolio: string, org: string, ring: string, docId: string): string {
  return `${portfolio}/${org}/${ring}/${docId}`;
}

function toRingDoc(item: JsonRecord): RingDoc {
  return {
    docId: validateString(item._id, 'Stored document _id'),
    index: validateString(item.index, 'Stored document index'),
    path: validateString(item.path, 'Stored document path'),
    portfolio: validateString(item.portfolio, 'Stored document portfolio'),
    org: validateString(item.org, 'Stored document org'),
    ring: validateString(item.ring, 'Stored document ring'),
    added: validateString(item.added, 'Stored document added'),
    modified: validateString(item.modified, 'Stored document modified'),
    data: validateJsonRecord(item.data, 'Stored document data'),
  };
}

function toItem(doc: RingDoc): JsonRecord {
  const { docId, ...rest } = doc;
  return { ...rest, _id: docId };
}

type Scope = { portfolio: string; org: string; ring: string; index: string };

/**
 * Read and write access to ring documents: records addressed by
 * `(portfolio, org, ring, docId)` and stored one partition per ring.
 *
 * @example
 * ```typescript
 * const dac = new DataController(store, 'ring_data');
 * const job = await dac.getDocument('portfolio', 'org', 'schd_jobs', jobId);
 * ```
 */
export class DataController {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly newId: IdGenerator;

  constructor(
    private readonly store: TableStore,
    private readonly table: string,
    options: ControllerOptions = {},
  ) {
    this.logger = (options.logger ?? new Logger('silent')).child('data');
    this.clock = options.clock ?? utcClock;
    this.newId = options.idGenerator ?? uuidGenerator;
  }

  /**
   * Fetch a single document.
   *
   * @throws ValidationError if any key segment is empty or contains a separator
   * @throws NotFoundError if the document does not exist
   */
  async getDocument(portfolio: string, org: string, ring: string, docId: string): Promise<RingDoc> {
    const doc = await this.findDocument(portfolio, org, ring, docId);
    if (!doc) throw new NotFoundError(`document ${ringPath(portfolio, org, ring, docId)}`);
    return doc;
  }

  /** Same lookup as {@link getDocument}, resolving `undefined` for a missing document. */
  async findDocument(portfolio: string, org: string, ring: string, docId: string): Promise<RingDoc | undefined> {
    const scope = this.scope(portfolio, org, ring);
    const id = validateKeySegment(docId, 'Document id');

    const item = await this.store.get(this.table, { partition: scope.index, sort: id });
    this.logger.debug('Document lookup', { index: scope.index, docId: id, found: item !== undefined });
    return item && toRingDoc(item);
  }

  /**
   * List one page of a ring, ordered by document id.
   */
  async listDocuments(portfolio: string, org: string, ring: string, page: PageRequest = {}): Promise<Page<RingDoc>> {
    const scope = this.scope(portfolio, org, ring);
    const limit = page.limit === undefined ? DEFAULT_PAGE_LIMIT : validatePositiveInt(page.limit, 'Limit');

    const res = await this.store.query(this.table, scope.index, { limit, startAfter: page.lastKey });
    const items = res.items.map(toRingDoc);
    this.logger.debug('Documents listed', { index: scope.index, count: items.length, more: res.lastKey !== undefined });
    return res.lastKey === undefined ? { items } : { items, lastKey: res.lastKey };
  }

  /**
   * Create a document. The id is generated unless `options.docId` is given.
   *
   * @throws ConflictError if a document with that id already exists in the ring
   */
  async createDocument(
    portfolio: string,
    org: string,
    ring: string,
    data: Record<string, unknown>,
    options: { docId?: string } = {},
  ): Promise<RingDoc> {
    const scope = this.scope(portfolio, org, ring);
    const docId = validateKeySegment(options.docId ?? this.newId(), 'Document id');
    const now = toIso(this.clock());

    const doc: RingDoc = {
      docId,
      index: scope.index,
      path: ringPath(scope.portfolio, scope.org, scope.ring, docId),
      portfolio: scope.portfolio,
      org: scope.org,
      ring: scope.ring,
      added: now,
      modified: now,
      data: sanitizeRecord(data),
    };

    await this.store.put(this.table, toItem(doc), { ifNotExists: true });
    this.logger.info('Document created', { path: doc.path });
    return doc;
  }

  /**
   * Shallow-merge `changes` into the document's data.
   *
   * @throws NotFoundError if the document does not exist
   */
  async updateDocument(
    portfolio: string,
    org: string,
    ring: string,
    docId: string,
    changes: Record<string, unknown>,
  ): Promise<RingDoc> {
    const existing = await this.getDocument(portfolio, org, ring, docId);
    const updated: RingDoc = {
      ...existing,
      modified: toIso(this.clock()),
      data: { ...existing.data, ...sanitizeRecord(changes) },
    };

    await this.store.put(this.table, toItem(updated));
    this.logger.info('Document updated', { path: updated.path, fields: Object.keys(changes) });
    return updated;
  }

  /**
   * @throws NotFoundError if the document does not exist
   */
  async deleteDocument(portfolio: string, org: string, ring: string, docId: string): Promise<void> {
    const scope = this.scope(portfolio, org, ring);
    const id = validateKeySegment(docId, 'Document id');

    const removed = await this.store.delete(this.table, { partition: scope.index, sort: id });
    if (!removed) throw new NotFoundError(`document ${ringPath(scope.portfolio, scope.org, scope.ring, id)}`);
    this.logger.info('Document deleted', { index: scope.index, docId: id });
  }

  private scope(portfolio: string, org: string, ring: string): Scope {
    const p = validateKeySegment(portfolio, 'Portfolio');
    const o = validateKeySegment(org, 'Org');
    const r = validateKeySegment(ring, 'Ring');
    return { portfolio: p, org: o, ring: r, index: ringIndex(p, o, r) };
  }
}
