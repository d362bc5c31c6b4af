import type { JsonRecord, JsonValue } from './doc';

/** Where a conversation lives: a single entity inside a portfolio/org. */
export type ChatContext = {
  portfolio: string;
  org: string;
  entityType: string;
  entityId: string;
};

export type MessageType = 'user' | 'consent' | 'system' | 'text' | 'tool_rq' | 'tool_rs' | 'debug' | 'widget';

/** Stored wrapper around the payload that is replayed to a model as `_out`. */
export type MessageWrap = {
  _out: JsonValue;
  _type: MessageType;
  _next?: string | null;
  _interface?: string | null;
};

export type ChatThread = {
  _id: string;
  entityIndex: string;
  added: string;
  publicUser: string;
  isActive: boolean;
};

export type ChatTurn = {
  _id: string;
  threadId: string;
  time: string;
  authorId: string;
  isActive: boolean;
  context: JsonRecord;
  messages: MessageWrap[];
};

export type Workspace = {
  _id: string;
  threadId: string;
  time: string;
  modified: string;
  state: JsonRecord;
};

export type HistoryFilter = {
  param: '_interface' | '_next' | '_type';
  beginsWith: string;
};

/** Belief-style history entry; newer entries sit at the end of the list. */
export type HistoryEntry = {
  key: string;
  val: JsonValue;
  time?: string;
  type?: string;
};
