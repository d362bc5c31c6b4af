/**
 * One page of a partition query. `lastKey` is present only when more items remain
 * and is passed back as `lastKey` to fetch the next page.
 */
export type Page<T> = {
  items: T[];
  lastKey?: string;
};

export type PageRequest = {
  limit?: number;
  lastKey?: string;
};
