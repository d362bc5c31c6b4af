import { randomUUID } from 'node:crypto';
import type { Clock } from './date-utils';
import type { Logger } from './logger';

export type IdGenerator = () => string;

export const uuidGenerator: IdGenerator = () => randomUUID();

/** Collaborators every controller accepts; each falls back to a production default. */
export type ControllerOptions = {
  logger?: Logger;
  clock?: Clock;
  idGenerator?: IdGenerator;
};
