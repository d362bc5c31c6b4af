import type { AppConfig } from './types';
import type { BlobStore, TableSchema, TableStore } from './store';
import { MemoryBlobStore, MemoryTableStore } from './store';
import { configString, createLogger } from './config/config';
import { DataController, RING_DATA_SCHEMA } from './data/data.controller';
import { AuthController, ENTITY_SCHEMA, REL_SCHEMA } from './auth/auth.controller';
import { CHAT_SCHEMA, ChatController } from './chat/chat.controller';
import { DocsController } from './docs/docs.controller';
import { HandlerRegistry } from './schd/handler-registry';
import type { RuleScheduler } from './schd/rule-scheduler';
import { MemoryRuleScheduler } from './schd/rule-scheduler';
import { SchdController } from './schd/schd.controller';
import type { Logger } from './utils/logger';
import type { ControllerOptions } from './utils/runtime';

export type TableNames = {
  ringData: string;
  entity: string;
  rel: string;
  chat: string;
};

export type ControllerDeps = ControllerOptions & {
  tableStore?: TableStore;
  blobStore?: BlobStore;
  rules?: RuleScheduler;
  handlers?: HandlerRegistry;
};

export type Controllers = {
  data: DataController;
  auth: AuthController;
  chat: ChatController;
  docs: DocsController;
  schd: SchdController;
  handlers: HandlerRegistry;
  logger: Logger;
};

export function tableNames(config: AppConfig): TableNames {
  return {
    ringData: configString(config, 'DYNAMODB_RINGDATA_TABLE', 'default_ringdata_table'),
    entity: configString(config, 'DYNAMODB_ENTITY_TABLE', 'default_entity_table'),
    rel: configString(config, 'DYNAMODB_REL_TABLE', 'default_rel_table'),
    chat: configString(config, 'DYNAMODB_CHAT_TABLE', 'default_chat_table'),
  };
}

/** Schemas for every table the controllers use, keyed by configured table name. */
export function tableSchemas(names: TableNames): Record<string, TableSchema> {
  return {
    [names.ringData]: RING_DATA_SCHEMA,
    [names.entity]: ENTITY_SCHEMA,
    [names.rel]: REL_SCHEMA,
    [names.chat]: CHAT_SCHEMA,
  };
}

/**
 * Wire every controller over shared stores. Stores that are not passed in are
 * in-memory ones built from the configured table names.
 *
 * @example
 * ```typescript
 * const { data } = createControllers(loadConfig());
 * const doc = await data.getDocument('portfolio', 'org', 'ring', 'idx');
 * ```
 */
export function createControllers(config: AppConfig, deps: ControllerDeps = {}): Controllers {
  const names = tableNames(config);
  const logger = deps.logger ?? createLogger(config);
  const options: ControllerOptions = { logger, clock: deps.clock, idGenerator: deps.idGenerator };

  const tableStore = deps.tableStore ?? new MemoryTableStore(tableSchemas(names));
  const blobStore = deps.blobStore ?? new MemoryBlobStore();
  const handlers = deps.handlers ?? new HandlerRegistry(config, logger);

  const data = new DataController(tableStore, names.ringData, options);
  const docBaseUrl = config.TANK_DOC_BASE_URL;
  const docs = new DocsController(blobStore, {
    ...options,
    baseUrl: docBaseUrl === undefined ? undefined : String(docBaseUrl),
  });
  const schd = new SchdController({ data, docs, rules: deps.rules ?? new MemoryRuleScheduler(), handlers }, options);

  return {
    data,
    auth: new AuthController(tableStore, { entity: names.entity, rel: names.rel }, options),
    chat: new ChatController(tableStore, names.chat, options),
    docs,
    schd,
    handlers,
    logger,
  };
}
