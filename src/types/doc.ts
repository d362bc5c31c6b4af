/** Any value that survives a JSON round trip. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonRecord = { [key: string]: JsonValue };

/** Generic document envelope with docId, ring location, timestamps and data payload. */
export type Doc<D extends JsonRecord = JsonRecord> = {
  docId: string;
  index: string; // <portfolio>:<org>:<ring>
  path: string; // <portfolio>/<org>/<ring>/<docId>
  portfolio: string;
  org: string;
  ring: string;
  added: string; // UTC ISO
  modified: string; // UTC ISO
  data: D;
};

export type RingDoc = Doc;
