import type { RawTable } from "../../src/lib/import/types";

export type SessionStore = {
  get: (key: string) => RawTable | null;
  set: (key: string, table: RawTable) => void;
  delete: (key: string) => boolean;
  size: () => number;
};

type SessionEntry = {
  table: RawTable;
  lastTouched: number;
};

export type SessionStoreOptions = {
  ttlMs: number;
  now?: () => number;
};

/**
 * In-memory tables keyed by browser tab. Entries idle for longer than the
 * TTL are dropped on the next access of any key.
 */
export const createSessionStore = ({ ttlMs, now = Date.now }: SessionStoreOptions): SessionStore => {
  const entries = new Map<string, SessionEntry>();

  const sweep = (at: number) => {
    entries.forEach((entry, key) => {
      if (at - entry.lastTouched > ttlMs) {
        entries.delete(key);
      }
    });
  };

  return {
    get: (key) => {
      const at = now();
      sweep(at);
      const entry = entries.get(key);
      if (!entry) {
        return null;
      }
      entry.lastTouched = at;
      return entry.table;
    },
    set: (key, table) => {
      const at = now();
      sweep(at);
      entries.set(key, { table, lastTouched: at });
    },
    delete: (key) => entries.delete(key),
    size: () => entries.size
  };
};
