import type { Entity, Identity, JsonRecord, Page, PageRequest, Rel } from '../types';
import type { TableSchema, TableStore } from '../store';
import type { Clock } from '../utils/date-utils';
import { toIso, utcClock } from '../utils/date-utils';
import { decodeJwt, getUsernameFromEmail } from '../utils/common';
import { NotFoundError } from '../utils/errors';
import { Logger } from '../utils/logger';
import type { ControllerOptions, IdGenerator } from '../utils/runtime';
import { uuidGenerator } from '../utils/runtime';
import { sanitizeRecord } from '../utils/sanitize';
import { validateJsonRecord, validatePositiveInt, validateString } from '../utils/validation';
import { DEFAULT_PAGE_LIMIT } from '../data/data.controller';

export const ENTITY_SCHEMA: TableSchema = { partitionKey: 'index', sortKey: '_id' };
export const REL_SCHEMA: TableSchema = { partitionKey: 'index', sortKey: 'rel' };

export type AuthTables = {
  entity: string;
  rel: string;
};

function toEntity(item: JsonRecord): Entity {
  return {
    index: validateString(item.index, 'Entity index'),
    _id: validateString(item._id, 'Entity _id'),
    time: validateString(item.time, 'Entity time'),
    attributes: validateJsonRecord(item.attributes, 'Entity attributes'),
  };
}

function toRel(item: JsonRecord): Rel {
  return {
    index: validateString(item.index, 'Rel index'),
    rel: validateString(item.rel, 'Rel rel'),
    time: validateString(item.time, 'Rel time'),
    attributes: validateJsonRecord(item.attributes, 'Rel attributes'),
  };
}

/**
 * Entities (users, teams, orgs, ...) and the relationships between them.
 *
 * Entities are grouped by an `index` (e.g. `irn:entity:user`) and keyed by `_id`.
 * Relationships are grouped by the owning index and keyed by a `rel` string whose
 * prefix makes them listable (e.g. `team:<id>`).
 */
export class AuthController {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly newId: IdGenerator;

  constructor(
    private readonly store: TableStore,
    private readonly tables: AuthTables,
    options: ControllerOptions = {},
  ) {
    this.logger = (options.logger ?? new Logger('silent')).child('auth');
    this.clock = options.clock ?? utcClock;
    this.newId = options.idGenerator ?? uuidGenerator;
  }

  // ---------------------------------------------------------------- identity

  /**
   * Identity claims of an already-authorized bearer token.
   *
   * @throws ValidationError if the token is malformed or carries no `sub`
   */
  identityFromToken(token: string): Identity {
    const claims = decodeJwt(token);
    const sub = validateString(claims.sub, 'Token sub');
    const email = typeof claims.email === 'string' ? claims.email : undefined;

    const identity: Identity = { sub };
    if (email !== undefined) {
      identity.email = email;
      identity.username = getUsernameFromEmail(email);
    }
    return identity;
  }

  // ---------------------------------------------------------------- entities

  async getEntity(index: string, id: string): Promise<Entity> {
    const key = { partition: validateString(index, 'Entity index'), sort: validateString(id, 'Entity id') };
    const item = await this.store.get(this.tables.entity, key);
    if (!item) throw new NotFoundError(`entity ${index}/${id}`);
    return toEntity(item);
  }

  async listEntities(index: string, page: PageRequest = {}): Promise<Page<Entity>> {
    const limit = page.limit === undefined ? DEFAULT_PAGE_LIMIT : validatePositiveInt(page.limit, 'Limit');
    const res = await this.store.query(this.tables.entity, validateString(index, 'Entity index'), {
      limit,
      startAfter: page.lastKey,
    });
    const items = res.items.map(toEntity);
    return res.lastKey === undefined ? { items } : { items, lastKey: res.lastKey };
  }

  /**
   * @throws ConflictError if `options.id` is already taken in the index
   */
  async createEntity(index: string, attributes: Record<string, unknown>, options: { id?: string } = {}): Promise<Entity> {
    const entity: Entity = {
      index: validateString(index, 'Entity index'),
      _id: validateString(options.id ?? this.newId(), 'Entity id'),
      time: toIso(this.clock()),
      attributes: sanitizeRecord(attributes),
    };
    await this.store.put(this.tables.entity, { ...entity }, { ifNotExists: true });
    this.logger.info('Entity created', { index: entity.index, id: entity._id });
    return entity;
  }

  async updateEntity(index: string, id: string, changes: Record<string, unknown>): Promise<Entity> {
    const existing = await this.getEntity(index, id);
    const updated: Entity = { ...existing, attributes: { ...existing.attributes, ...sanitizeRecord(changes) } };
    await this.store.put(this.tables.entity, { ...updated });
    this.logger.info('Entity updated', { index, id, fields: Object.keys(changes) });
    return updated;
  }

  async deleteEntity(index: string, id: string): Promise<void> {
    const removed = await this.store.delete(this.tables.entity, {
      partition: validateString(index, 'Entity index'),
      sort: validateString(id, 'Entity id'),
    });
    if (!removed) throw new NotFoundError(`entity ${index}/${id}`);
    this.logger.info('Entity deleted', { index, id });
  }

  // ----------------------------------------------------------- relationships

  async getRel(index: string, rel: string): Promise<Rel> {
    const key = { partition: validateString(index, 'Rel index'), sort: validateString(rel, 'Rel') };
    const item = await this.store.get(this.tables.rel, key);
    if (!item) throw new NotFoundError(`rel ${index}/${rel}`);
    return toRel(item);
  }

  async listRels(index: string, page: PageRequest = {}): Promise<Page<Rel>> {
    const limit = page.limit === undefined ? DEFAULT_PAGE_LIMIT : validatePositiveInt(page.limit, 'Limit');
    const res = await this.store.query(this.tables.rel, validateString(index, 'Rel index'), {
      limit,
      startAfter: page.lastKey,
    });
    const items = res.items.map(toRel);
    return res.lastKey === undefined ? { items } : { items, lastKey: res.lastKey };
  }

  /** Every relationship of `index` whose key starts with `prefix`. */
  async listRelsByPrefix(index: string, prefix: string): Promise<Rel[]> {
    const res = await this.store.query(this.tables.rel, validateString(index, 'Rel index'), {
      beginsWith: validateString(prefix, 'Rel prefix'),
    });
    return res.items.map(toRel);
  }

  /** Creates or overwrites the relationship. */
  async createRel(index: string, rel: string, attributes: Record<string, unknown> = {}): Promise<Rel> {
    const row: Rel = {
      index: validateString(index, 'Rel index'),
      rel: validateString(rel, 'Rel'),
      time: toIso(this.clock()),
      attributes: sanitizeRecord(attributes),
    };
    await this.store.put(this.tables.rel, { ...row });
    this.logger.info('Rel created', { index: row.index, rel: row.rel });
    return row;
  }

  async deleteRel(index: string, rel: string): Promise<void> {
    const removed = await this.store.delete(this.tables.rel, {
      partition: validateString(index, 'Rel index'),
      sort: validateString(rel, 'Rel'),
    });
    if (!removed) throw new NotFoundError(`rel ${index}/${rel}`);
    this.logger.info('Rel deleted', { index, rel });
  }
}
