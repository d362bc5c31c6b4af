import type { JsonRecord } from './doc';

/** Row of the entity table: partition `index`, sort `_id`. */
export type Entity = {
  index: string;
  _id: string;
  time: string;
  attributes: JsonRecord;
};

/** Row of the relationship table: partition `index`, sort `rel`. */
export type Rel = {
  index: string;
  rel: string;
  time: string;
  attributes: JsonRecord;
};

export type Identity = {
  sub: string;
  email?: string;
  username?: string;
};
