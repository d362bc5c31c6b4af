export * from './types';
export * from './store';
export { loadConfig, configString, createLogger, candidatePaths, ENV_KEYS, CRITICAL_KEYS } from './config/config';
export { DataController, ringIndex, ringPath, RING_DATA_SCHEMA, DEFAULT_PAGE_LIMIT } from './data/data.controller';
export { AuthController, ENTITY_SCHEMA, REL_SCHEMA } from './auth/auth.controller';
export type { AuthTables } from './auth/auth.controller';
export { ChatController, CHAT_SCHEMA, HISTORY_TYPES, MESSAGE_TYPES } from './chat/chat.controller';
export { clearToolMessageContent, pruneHistory } from './chat/history';
export { applyWorkspaceChanges, emptyAgentState, getStep } from './chat/workspace';
export { DocsController, extensionFor } from './docs/docs.controller';
export type { DocsControllerOptions } from './docs/docs.controller';
export { HandlerRegistry, handlerKey } from './schd/handler-registry';
export type { JobHandler, HandlerFactory, RunOptions } from './schd/handler-registry';
export { MemoryRuleScheduler, SCHEDULE_EXPRESSION } from './schd/rule-scheduler';
export type { RuleScheduler } from './schd/rule-scheduler';
export { SchdController, canonicalOutput, ruleName, JOBS_RING, RUNS_RING, JOB_TRIGGERS } from './schd/schd.controller';
export type { SchdDeps } from './schd/schd.controller';
export { createControllers, tableNames, tableSchemas } from './controllers';
export type { Controllers, ControllerDeps, TableNames } from './controllers';
export { LOG_LEVELS, Logger, isLogLevel } from './utils/logger';
export type { LogLevel } from './utils/logger';
export { DataError, ValidationError, NotFoundError, ConflictError, ConfigError, HandlerError } from './utils/errors';
export { decodeJwt, getUsernameFromEmail, createMd5Hash } from './utils/common';
export { sanitize, sanitizeRecord } from './utils/sanitize';
export type { Clock } from './utils/date-utils';
export type { ControllerOptions, IdGenerator } from './utils/runtime';
