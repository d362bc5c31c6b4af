/** 
 * Central export of all type definitions for the controllers and stores. 
 * */

export type { Doc, RingDoc, JsonValue, JsonRecord } from './doc';
export type { Page, PageRequest } from './page';
export type { AppConfig, ConfigValue, LoadConfigOptions } from './config';
export type { Entity, Rel, Identity } from './auth';
export type {
  ChatContext,
  ChatThread,
  ChatTurn,
  HistoryEntry,
  HistoryFilter,
  MessageType,
  MessageWrap,
  Workspace,
} from './chat';
export type { StoredFile, StoredFileWithBody } from './docs';
export type {
  HandlerCall,
  HandlerCallAction,
  HandlerResult,
  JobRunPayload,
  JobRunReport,
  JobRunStep,
  JobTrigger,
  ScheduleRule,
} from './schedule';
