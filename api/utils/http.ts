import { randomUUID } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";
import { ZodError, type ZodType, type ZodTypeDef } from "zod";
import { isScoreDataError } from "../../src/lib/scores/errors";
import type { RawTable } from "../../src/lib/import/types";
import type { SessionStore } from "./sessionStore";

export type ApiRequest = AsyncIterable<Uint8Array | string> & {
  method?: string;
  headers: IncomingHttpHeaders;
  body?: unknown;
};

export type ApiResponse = {
  statusCode: number;
  setHeader: (name: string, value: string) => unknown;
  end: (body: string) => unknown;
};

export class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

export const SESSION_HEADER = "x-tab-id";
const MAX_JSON_BYTES = 1024 * 1024;

export const createRequestId = (): string => {
  try {
    return randomUUID();
  } catch {
    return `req-${Math.random().toString(36).slice(2, 10)}`;
  }
};

export const jsonResponse = (
  res: ApiResponse,
  statusCode: number,
  payload: Record<string, unknown>
) => {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
};

export const sessionKeyFrom = (req: ApiRequest): string => {
  const value = req.headers[SESSION_HEADER];
  const key = Array.isArray(value) ? value[0] : value;
  return key?.trim() || "default";
};

export const readRawBody = async (req: ApiRequest, limitBytes: number): Promise<Buffer> => {
  if (typeof req.body === "string") {
    return Buffer.from(req.body, "utf8");
  }
  if (req.body instanceof Uint8Array) {
    return Buffer.from(req.body);
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk);
    size += buffer.length;
    if (size > limitBytes) {
      throw new HttpError(413, "File too large");
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
};

export const readJsonBody = async (req: ApiRequest): Promise<unknown> => {
  if (typeof req.body === "object" && req.body !== null && !(req.body instanceof Uint8Array)) {
    return req.body;
  }
  const raw = await readRawBody(req, MAX_JSON_BYTES);
  if (raw.length === 0) {
    return {};
  }
  try {
    return JSON.parse(raw.toString("utf8"));
  } catch {
    throw new HttpError(400, "Invalid JSON body");
  }
};

export const createRouteLogger = (route: string) => ({
  start: (payload: Record<string, unknown>) => {
    console.info(`[${route}] start`, payload);
  },
  success: (payload: Record<string, unknown>) => {
    console.info(`[${route}] success`, payload);
  },
  failure: (requestId: string, error: unknown) => {
    const payload =
      error instanceof Error
        ? { message: error.message, stack: error.stack }
        : { message: String(error), stack: undefined };
    console.error(`[${route}] fail`, { requestId, ...payload });
  }
});

export const describeError = (error: unknown): { status: number; message: string } => {
  if (error instanceof HttpError) {
    return { status: error.status, message: error.message };
  }
  if (isScoreDataError(error)) {
    return { status: 400, message: error.message };
  }
  if (error instanceof ZodError) {
    return { status: 400, message: "Invalid request" };
  }
  return { status: 500, message: "Internal error" };
};

export type RouteContext<T> = {
  requestId: string;
  sessionKey: string;
  input: T;
  table: RawTable | null;
};

export type JsonRouteOptions<T> = {
  route: string;
  store: SessionStore;
  schema: ZodType<T, ZodTypeDef, unknown>;
  run: (context: RouteContext<T>) => Record<string, unknown>;
};

/**
 * POST-only JSON route over the caller's session table: validates the body,
 * runs the computation and wraps the outcome in the response envelope.
 */
export const handleJsonRoute = async <T>(
  req: ApiRequest,
  res: ApiResponse,
  { route, store, schema, run }: JsonRouteOptions<T>
) => {
  const requestId = createRequestId();
  const log = createRouteLogger(route);
  const sessionKey = sessionKeyFrom(req);
  log.start({ requestId, method: req.method, sessionKey });

  if (req.method !== "POST") {
    return jsonResponse(res, 405, { ok: false, error: "Method Not Allowed", requestId });
  }

  try {
    const input = schema.parse(await readJsonBody(req));
    const result = run({ requestId, sessionKey, input, table: store.get(sessionKey) });
    log.success({ requestId, sessionKey });
    return jsonResponse(res, 200, { ok: true, requestId, ...result });
  } catch (error) {
    log.failure(requestId, error);
    const { status, message } = describeError(error);
    return jsonResponse(res, status, { ok: false, error: message, requestId });
  }
};
