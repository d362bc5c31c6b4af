import type {
  ChatContext,
  ChatThread,
  ChatTurn,
  HistoryFilter,
  JsonRecord,
  JsonValue,
  MessageType,
  MessageWrap,
  Workspace,
} from '../types';
import { DateTime } from 'luxon';
import type { TableSchema, TableStore } from '../store';
import type { Clock } from '../utils/date-utils';
import { toIso, utcClock } from '../utils/date-utils';
import { NotFoundError } from '../utils/errors';
import { Logger } from '../utils/logger';
import type { ControllerOptions, IdGenerator } from '../utils/runtime';
import { uuidGenerator } from '../utils/runtime';
import { sanitize, sanitizeRecord } from '../utils/sanitize';
import { applyWorkspaceChanges } from './workspace';
import {
  isRecord,
  validateArray,
  validateBoolean,
  validateJsonRecord,
  validateJsonValue,
  validateKeySegment,
  validateLiteral,
  validateString,
  ValidationError,
} from '../utils/validation';

export const CHAT_SCHEMA: TableSchema = { partitionKey: 'index', sortKey: 'sk' };

export const MESSAGE_TYPES: readonly MessageType[] = [
  'user', 'consent', 'system', 'text', 'tool_rq', 'tool_rs', 'debug', 'widget',
];

/** Message types that are replayed to a model as conversation history. */
export const HISTORY_TYPES: readonly MessageType[] = ['user', 'consent', 'system', 'text', 'tool_rq', 'tool_rs'];

const THREAD = 'thread#';
const TURN = 'turn#';
const WORKSPACE = 'workspace#';

function optionalNullableString(value: unknown, fieldName: string): string | null | undefined {
  if (value === undefined || value === null) return value;
  if (typeof value !== 'string') throw new ValidationError(`${fieldName} must be a string or null`);
  return value;
}

export function toMessageWrap(value: unknown): MessageWrap {
  if (!isRecord(value)) throw new ValidationError('Message must be an object');
  const wrap: MessageWrap = {
    _out: validateJsonValue(value._out, 'Message _out'),
    _type: validateLiteral(value._type, 'Message _type', MESSAGE_TYPES),
  };
  const next = optionalNullableString(value._next, 'Message _next');
  if (next !== undefined) wrap._next = next;
  const iface = optionalNullableString(value._interface, 'Message _interface');
  if (iface !== undefined) wrap._interface = iface;
  return wrap;
}

function wrapToJson(m: MessageWrap): JsonRecord {
  const out: JsonRecord = { _out: m._out, _type: m._type };
  if (m._next !== undefined) out._next = m._next;
  if (m._interface !== undefined) out._interface = m._interface;
  return out;
}

function toThread(item: JsonRecord): ChatThread {
  return {
    _id: validateString(item._id, 'Thread _id'),
    entityIndex: validateString(item.entityIndex, 'Thread entityIndex'),
    added: validateString(item.added, 'Thread added'),
    publicUser: typeof item.publicUser === 'string' ? item.publicUser : '',
    isActive: validateBoolean(item.isActive, 'Thread isActive'),
  };
}

function toTurn(item: JsonRecord): ChatTurn {
  return {
    _id: validateString(item._id, 'Turn _id'),
    threadId: validateString(item.threadId, 'Turn threadId'),
    time: validateString(item.time, 'Turn time'),
    authorId: typeof item.authorId === 'string' ? item.authorId : '',
    isActive: validateBoolean(item.isActive, 'Turn isActive'),
    context: validateJsonRecord(item.context, 'Turn context'),
    messages: validateArray(item.messages, 'Turn messages').map(toMessageWrap),
  };
}

function toWorkspace(item: JsonRecord): Workspace {
  return {
    _id: validateString(item._id, 'Workspace _id'),
    threadId: validateString(item.threadId, 'Workspace threadId'),
    time: validateString(item.time, 'Workspace time'),
    modified: validateString(item.modified, 'Workspace modified'),
    state: validateJsonRecord(item.state, 'Workspace state'),
  };
}

/**
 * Conversation storage for an entity: threads, the turns inside them and the
 * agent workspaces attached to each thread.
 *
 * Sort keys embed the creation time so partitions list in chronological order. Creation
 * times issued by one controller are strictly increasing, so records written within the
 * same millisecond keep their insertion order.
 */
export class ChatController {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly newId: IdGenerator;
  private lastStamp = 0;

  constructor(
    private readonly store: TableStore,
    private readonly table: string,
    options: ControllerOptions = {},
  ) {
    this.logger = (options.logger ?? new Logger('silent')).child('chat');
    this.clock = options.clock ?? utcClock;
    this.newId = options.idGenerator ?? uuidGenerator;
  }

  // ----------------------------------------------------------------- threads

  async createThread(ctx: ChatContext, options: { publicUser?: string } = {}): Promise<ChatThread> {
    const entityIndex = this.entityIndex(ctx);
    const thread: ChatThread = {
      _id: this.nextId(),
      entityIndex,
      added: this.stamp(),
      publicUser: options.publicUser ?? '',
      isActive: true,
    };
    await this.store.put(this.table, { ...thread, index: entityIndex, sk: `${THREAD}${thread.added}#${thread._id}` });
    this.logger.info('Thread created', { entityIndex, threadId: thread._id });
    return thread;
  }

  /** Threads of the entity, oldest first. */
  async listThreads(ctx: ChatContext): Promise<ChatThread[]> {
    const res = await this.store.query(this.table, this.entityIndex(ctx), { beginsWith: THREAD });
    return res.items.map(toThread);
  }

  async getThread(ctx: ChatContext, threadId: string): Promise<ChatThread> {
    const id = validateKeySegment(threadId, 'Thread id');
    const thread = (await this.listThreads(ctx)).find((t) => t._id === id);
    if (!thread) throw new NotFoundError(`thread ${this.entityIndex(ctx)}/${id}`);
    return thread;
  }

  /** Oldest existing thread of the entity, creating one when there is none. */
  async ensureThread(ctx: ChatContext, options: { publicUser?: string } = {}): Promise<ChatThread> {
    const [first] = await this.listThreads(ctx);
    if (first) return first;
    return this.createThread(ctx, options);
  }

  // ------------------------------------------------------------------- turns

  /**
   * Append a turn to a thread.
   *
   * @throws NotFoundError if the thread does not exist
   * @throws ValidationError if a message wrapper is malformed
   */
  async createTurn(
    ctx: ChatContext,
    threadId: string,
    turn: { context?: Record<string, unknown>; messages: unknown[] },
    options: { authorId?: string } = {},
  ): Promise<ChatTurn> {
    const thread = await this.getThread(ctx, threadId);
    const created: ChatTurn = {
      _id: this.nextId(),
      threadId: thread._id,
      time: this.stamp(),
      authorId: options.authorId ?? '',
      isActive: true,
      context: sanitizeRecord(turn.context ?? {}),
      messages: validateArray(turn.messages, 'Turn messages').map((m) => toMessageWrap(sanitize(m))),
    };
    await this.putTurn(ctx, created);
    this.logger.info('Turn created', { threadId: thread._id, turnId: created._id, messages: created.messages.length });
    return created;
  }

  /** Turns of a thread, oldest first. */
  async listTurns(ctx: ChatContext, threadId: string): Promise<ChatTurn[]> {
    const res = await this.store.query(this.table, this.threadIndex(ctx, threadId), { beginsWith: TURN });
    return res.items.map(toTurn);
  }

  /**
   * Append messages to a turn and/or toggle whether it is active.
   *
   * @throws NotFoundError if the turn does not exist
   */
  async updateTurn(
    ctx: ChatContext,
    threadId: string,
    turnId: string,
    update: { messages?: unknown[]; isActive?: boolean },
  ): Promise<ChatTurn> {
    const existing = (await this.listTurns(ctx, threadId)).find((t) => t._id === turnId);
    if (!existing) throw new NotFoundError(`turn ${this.threadIndex(ctx, threadId)}/${turnId}`);

    const appended = (update.messages ?? []).map((m) => toMessageWrap(sanitize(m)));
    const isActive = update.isActive === undefined ? existing.isActive : validateBoolean(update.isActive, 'Turn isActive');
    const updated: ChatTurn = {
      ...existing,
      isActive,
      messages: [...existing.messages, ...appended],
    };
    await this.putTurn(ctx, updated);
    this.logger.debug('Turn updated', { turnId, appended: appended.length, isActive: updated.isActive });
    return updated;
  }

  /**
   * Flattened `_out` payloads of a thread that may be shown to a model, oldest first.
   * With a filter, only messages whose `filter.param` starts with `filter.beginsWith`
   * are considered; messages without the param are dropped.
   */
  async getMessageHistory(ctx: ChatContext, threadId: string, filter?: HistoryFilter): Promise<JsonValue[]> {
    const turns = await this.listTurns(ctx, threadId);
    const out: JsonValue[] = [];
    for (const turn of turns) {
      for (const m of turn.messages) {
        if (filter) {
          const v = m[filter.param];
          if (v === undefined || v === null) continue;
          if (!String(v).startsWith(filter.beginsWith)) continue;
        }
        if (HISTORY_TYPES.includes(m._type)) out.push(m._out);
      }
    }
    this.logger.debug('Message history built', { threadId, turns: turns.length, messages: out.length });
    return out;
  }

  // -------------------------------------------------------------- workspaces

  async createWorkspace(ctx: ChatContext, threadId: string, state: Record<string, unknown> = {}): Promise<Workspace> {
    const thread = await this.getThread(ctx, threadId);
    const now = this.stamp();
    const ws: Workspace = { _id: this.nextId(), threadId: thread._id, time: now, modified: now, state: sanitizeRecord(state) };
    await this.putWorkspace(ctx, ws);
    this.logger.info('Workspace created', { threadId: thread._id, workspaceId: ws._id });
    return ws;
  }

  /** Workspaces of a thread, oldest first. */
  async listWorkspaces(ctx: ChatContext, threadId: string): Promise<Workspace[]> {
    const res = await this.store.query(this.table, this.threadIndex(ctx, threadId), { beginsWith: WORKSPACE });
    return res.items.map(toWorkspace);
  }

  /**
   * Shallow-merge `changes` into the workspace state.
   *
   * @throws NotFoundError if the workspace does not exist
   */
  async updateWorkspace(
    ctx: ChatContext,
    threadId: string,
    workspaceId: string,
    changes: Record<string, unknown>,
  ): Promise<Workspace> {
    const existing = (await this.listWorkspaces(ctx, threadId)).find((w) => w._id === workspaceId);
    if (!existing) throw new NotFoundError(`workspace ${this.threadIndex(ctx, threadId)}/${workspaceId}`);

    const updated: Workspace = {
      ...existing,
      modified: toIso(this.clock()),
      state: { ...existing.state, ...sanitizeRecord(changes) },
    };
    await this.putWorkspace(ctx, updated);
    return updated;
  }

  /**
   * Apply agent changes (see {@link applyWorkspaceChanges}) to the given workspace, or to the
   * newest one. A thread without workspaces gets one first; `publicUser` is recorded in its
   * `context`.
   *
   * @throws NotFoundError if the thread, the given workspace or a referenced plan step does not exist
   */
  async mutateWorkspace(
    ctx: ChatContext,
    threadId: string,
    changes: Record<string, unknown>,
    options: { workspaceId?: string; publicUser?: string } = {},
  ): Promise<Workspace> {
    let all = await this.listWorkspaces(ctx, threadId);
    if (all.length === 0) {
      const initial = options.publicUser ? { context: { public_user: options.publicUser } } : {};
      all = [await this.createWorkspace(ctx, threadId, initial)];
    }

    const target =
      options.workspaceId === undefined ? all[all.length - 1] : all.find((w) => w._id === options.workspaceId);
    if (!target) throw new NotFoundError(`workspace ${this.threadIndex(ctx, threadId)}/${options.workspaceId ?? ''}`);

    const modified = toIso(this.clock());
    const updated: Workspace = { ...target, modified, state: applyWorkspaceChanges(target.state, sanitizeRecord(changes), modified) };
    await this.putWorkspace(ctx, updated);
    this.logger.debug('Workspace mutated', { workspaceId: target._id, changes: Object.keys(changes) });
    return updated;
  }

  /** The given workspace, or the newest one when no id is passed. */
  async getActiveWorkspace(ctx: ChatContext, threadId: string, workspaceId?: string): Promise<Workspace | undefined> {
    const all = await this.listWorkspaces(ctx, threadId);
    if (workspaceId === undefined) return all[all.length - 1];
    return all.find((w) => w._id === workspaceId);
  }

  // ----------------------------------------------------------------- helpers

  private stamp(): string {
    const ms = Math.max(this.clock().toMillis(), this.lastStamp + 1);
    this.lastStamp = ms;
    return toIso(DateTime.fromMillis(ms, { zone: 'utc' }));
  }

  private nextId(): string {
    return validateKeySegment(this.newId(), 'Generated id');
  }

  private entityIndex(ctx: ChatContext): string {
    return [
      validateKeySegment(ctx.portfolio, 'Portfolio'),
      validateKeySegment(ctx.org, 'Org'),
      validateKeySegment(ctx.entityType, 'Entity type'),
      validateKeySegment(ctx.entityId, 'Entity id'),
    ].join(':');
  }

  private threadIndex(ctx: ChatContext, threadId: string): string {
    return `${this.entityIndex(ctx)}:${validateKeySegment(threadId, 'Thread id')}`;
  }

  private async putTurn(ctx: ChatContext, turn: ChatTurn): Promise<void> {
    await this.store.put(this.table, {
      index: this.threadIndex(ctx, turn.threadId),
      sk: `${TURN}${turn.time}#${turn._id}`,
      _id: turn._id,
      threadId: turn.threadId,
      time: turn.time,
      authorId: turn.authorId,
      isActive: turn.isActive,
      context: turn.context,
      messages: turn.messages.map(wrapToJson),
    });
  }

  private async putWorkspace(ctx: ChatContext, ws: Workspace): Promise<void> {
    await this.store.put(this.table, { ...ws, index: this.threadIndex(ctx, ws.threadId), sk: `${WORKSPACE}${ws.time}#${ws._id}` });
  }
}
