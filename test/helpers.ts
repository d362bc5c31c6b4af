import { DateTime } from 'luxon';
import type { Clock } from '../src/utils/date-utils';
import type { IdGenerator } from '../src/utils/runtime';

export const T0 = '2026-10-19T08:00:00.000Z';

/** Clock that always answers `iso`. */
export function fixedClock(iso: string = T0): Clock {
  return () => DateTime.fromISO(iso, { zone: 'utc' });
}

/** Clock that advances `stepMinutes` on every call, starting at `iso`. */
export function steppingClock(iso: string = T0, stepMinutes = 1): Clock {
  let calls = 0;
  return () => DateTime.fromISO(iso, { zone: 'utc' }).plus({ minutes: stepMinutes * calls++ });
}

/** Ids `<prefix>-1`, `<prefix>-2`, ... */
export function sequentialIds(prefix = 'id'): IdGenerator {
  let n = 0;
  return () => `${prefix}-${++n}`;
}
