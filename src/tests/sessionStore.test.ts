// @vitest-environment node
import { describe, expect, it } from "vitest";
import { createSessionStore } from "../../api/utils/sessionStore";

const table = { headers: ["Start NR"], rows: [["1"]] };

const createClock = () => {
  let current = 0;
  return {
    now: () => current,
    set: (value: number) => {
      current = value;
    }
  };
};

describe("session store", () => {
  it("refreshes an entry on every read", () => {
    const clock = createClock();
    const store = createSessionStore({ ttlMs: 1000, now: clock.now });
    store.set("tab-a", table);

    clock.set(500);
    expect(store.get("tab-a")).toBe(table);
    clock.set(1400);
    expect(store.get("tab-a")).toBe(table);
    clock.set(2401);
    expect(store.get("tab-a")).toBeNull();
    expect(store.size()).toBe(0);
  });

  it("sweeps idle entries when another key is touched", () => {
    const clock = createClock();
    const store = createSessionStore({ ttlMs: 1000, now: clock.now });
    store.set("tab-a", table);

    clock.set(1500);
    store.set("tab-b", table);

    expect(store.size()).toBe(1);
    expect(store.get("tab-a")).toBeNull();
  });

  it("keeps the last write per key", () => {
    const store = createSessionStore({ ttlMs: 1000 });
    const replacement = { headers: ["Start NR"], rows: [["2"]] };
    store.set("tab-a", table);
    store.set("tab-a", replacement);

    expect(store.get("tab-a")).toBe(replacement);
    expect(store.delete("tab-a")).toBe(true);
    expect(store.get("tab-a")).toBeNull();
  });
});
