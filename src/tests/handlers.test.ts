// @vitest-environment node
import type { IncomingHttpHeaders } from "node:http";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createShotsHandler } from "../../api/shots";
import { createSummaryHandler } from "../../api/summary";
import { createTargetDataHandler } from "../../api/target-data";
import { createUploadHandler } from "../../api/upload";
import { defaultFieldsPath } from "../../api/utils/config";
import { loadFieldNames } from "../../api/utils/fieldNames";
import type { ApiResponse } from "../../api/utils/http";
import { createSessionStore, type SessionStore } from "../../api/utils/sessionStore";
import { prepareDeviceUpload } from "../lib/scores/requests";
import { DEVICE_EXPORT, FIELD_NAMES } from "./fixtures/deviceExport";

type FakeResponse = ApiResponse & { body: string; headers: Record<string, string> };

const createRequest = (
  method: string,
  body: string | null,
  headers: IncomingHttpHeaders = { "x-tab-id": "tab-1" }
) =>
  Object.assign(Readable.from(body === null ? [] : [Buffer.from(body, "utf8")]), {
    method,
    headers
  });

const createResponse = (): FakeResponse => {
  const response: FakeResponse = {
    statusCode: 200,
    body: "",
    headers: {},
    setHeader: (name, value) => {
      response.headers[name] = value;
    },
    end: (body) => {
      response.body = body;
    }
  };
  return response;
};

const postJson = async (
  handler: (req: ReturnType<typeof createRequest>, res: FakeResponse) => Promise<void>,
  payload: unknown,
  headers?: IncomingHttpHeaders
) => {
  const res = createResponse();
  await handler(createRequest("POST", JSON.stringify(payload), headers), res);
  return { status: res.statusCode, body: JSON.parse(res.body) };
};

const seededStore = (): SessionStore => {
  const store = createSessionStore({ ttlMs: 60_000 });
  store.set("tab-1", prepareDeviceUpload(DEVICE_EXPORT, FIELD_NAMES).table);
  return store;
};

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("field list file", () => {
  it("loads the bundled reference list", async () => {
    const names = await loadFieldNames(defaultFieldsPath());

    expect(names.slice(0, FIELD_NAMES.length)).toEqual(FIELD_NAMES);
  });

  it("returns no names for a missing file", async () => {
    expect(await loadFieldNames("/nonexistent/fields.txt")).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith(
      "[fields] unreadable",
      expect.objectContaining({ path: "/nonexistent/fields.txt" })
    );
  });
});

describe("upload handler", () => {
  const createHandler = (store: SessionStore, maxUploadBytes = 1024) =>
    createUploadHandler({ store, fieldsPath: defaultFieldsPath(), maxUploadBytes });

  it("stores the named table for the tab and reports suggestions", async () => {
    const store = createSessionStore({ ttlMs: 60_000 });
    const res = createResponse();

    await createHandler(store)(createRequest("POST", DEVICE_EXPORT), res);

    expect(res.statusCode).toBe(200);
    expect(res.headers["Content-Type"]).toBe("application/json");
    const body = JSON.parse(res.body);
    expect(body).toMatchObject({
      ok: true,
      headers: FIELD_NAMES,
      start_nr: "Start NR",
      primary_score: "Primary score",
      secondary_score: "Secondary score",
      row_count: 4,
      relays: ["1", "2"],
      start_nrs: ["1", "2"],
      delimiter: ";"
    });
    expect(typeof body.requestId).toBe("string");
    expect(store.get("tab-1")?.rows).toHaveLength(4);
  });

  it("rejects bodies over the size limit", async () => {
    const res = createResponse();

    await createHandler(createSessionStore({ ttlMs: 60_000 }), 10)(
      createRequest("POST", DEVICE_EXPORT),
      res
    );

    expect(res.statusCode).toBe(413);
    expect(JSON.parse(res.body)).toMatchObject({ ok: false, error: "File too large" });
  });

  it("rejects an empty file", async () => {
    const res = createResponse();

    await createHandler(createSessionStore({ ttlMs: 60_000 }))(createRequest("POST", null), res);

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body)).toMatchObject({ ok: false, error: "File has no data rows" });
  });

  it("fails when the field list cannot be read", async () => {
    const res = createResponse();
    const handler = createUploadHandler({
      store: createSessionStore({ ttlMs: 60_000 }),
      fieldsPath: "/nonexistent/fields.txt",
      maxUploadBytes: 1024
    });

    await handler(createRequest("POST", DEVICE_EXPORT), res);

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error).toBe(
      "Field list not found or empty; cannot assign column names"
    );
  });

  it("only accepts POST", async () => {
    const res = createResponse();

    await createHandler(createSessionStore({ ttlMs: 60_000 }))(createRequest("GET", null), res);

    expect(res.statusCode).toBe(405);
    expect(JSON.parse(res.body).error).toBe("Method Not Allowed");
  });
});

describe("summary handler", () => {
  it("summarizes the tab's table", async () => {
    const { status, body } = await postJson(createSummaryHandler(seededStore()), {
      relay: "1",
      excluded_indices: [0]
    });

    expect(status).toBe(200);
    expect(body.ok).toBe(true);
    expect(body.columns[0]).toBe("Start NR");
    expect(body.summary).toEqual([
      {
        "Start NR": "1",
        count: 1,
        "Decimal score_sum": 9.7,
        "Decimal score_mean": 9.7,
        "Integer score_sum": 9,
        "Integer score_mean": 9
      },
      {
        "Start NR": "2",
        count: 1,
        "Decimal score_sum": 8,
        "Decimal score_mean": 8,
        "Integer score_sum": 8,
        "Integer score_mean": 8
      }
    ]);
  });

  it("keeps tabs apart", async () => {
    const { status, body } = await postJson(
      createSummaryHandler(seededStore()),
      {},
      { "x-tab-id": "tab-2" }
    );

    expect(status).toBe(400);
    expect(body.error).toBe("Upload a file first");
  });

  it("falls back to the default session without a tab header", async () => {
    const store = createSessionStore({ ttlMs: 60_000 });
    store.set("default", prepareDeviceUpload(DEVICE_EXPORT, FIELD_NAMES).table);

    const { status, body } = await postJson(createSummaryHandler(store), {}, {});

    expect(status).toBe(200);
    expect(body.summary).toHaveLength(2);
  });

  it("rejects malformed bodies", async () => {
    const handler = createSummaryHandler(seededStore());
    const res = createResponse();
    await handler(createRequest("POST", "{not json"), res);

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error).toBe("Invalid JSON body");

    const invalid = await postJson(handler, { excluded_indices: [-1] });
    expect(invalid.status).toBe(400);
    expect(invalid.body.error).toBe("Invalid request");
  });
});

describe("shots handler", () => {
  it("returns the shots of a start number", async () => {
    const { status, body } = await postJson(createShotsHandler(seededStore()), { start_nr: 1 });

    expect(status).toBe(200);
    expect(body.shots).toEqual([
      {
        index: 2,
        Time: "14.0",
        "Primary score": "10.2",
        "Secondary score": "10",
        "Decimal score": 10.2,
        "Integer score": 10
      },
      {
        index: 1,
        Time: "13.0",
        "Primary score": "9.7",
        "Secondary score": "0",
        "Decimal score": 9.7,
        "Integer score": 9
      }
    ]);
  });

  it("requires a start number", async () => {
    const { status, body } = await postJson(createShotsHandler(seededStore()), {});

    expect(status).toBe(400);
    expect(body.error).toBe("start_nr required");
  });
});

describe("target data handler", () => {
  it("returns hit coordinates of the included shots", async () => {
    const { status, body } = await postJson(createTargetDataHandler(seededStore()), {
      start_nr: "2",
      excluded_indices: [3]
    });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      ok: true,
      start_nr: "2",
      shots: [{ shot_num: 1, x: 1.2, y: -0.5, decimal_score: 10.5 }]
    });
  });
});
