import { getConfig } from "./config";
import { createSessionStore, type SessionStore } from "./sessionStore";

let store: SessionStore | null = null;

export const getSessionStore = (): SessionStore => {
  if (!store) {
    store = createSessionStore({ ttlMs: getConfig().sessionTtlMs });
  }
  return store;
};
