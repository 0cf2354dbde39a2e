import { prepareDeviceUpload } from "../src/lib/scores/requests";
import type { UploadResult } from "../src/types/scoreApi";
import { getConfig } from "./utils/config";
import { loadFieldNames } from "./utils/fieldNames";
import {
  createRequestId,
  createRouteLogger,
  describeError,
  jsonResponse,
  readRawBody,
  sessionKeyFrom,
  type ApiRequest,
  type ApiResponse
} from "./utils/http";
import { getSessionStore } from "./utils/session";
import type { SessionStore } from "./utils/sessionStore";

export const config = {
  runtime: "nodejs"
};

export type UploadHandlerOptions = {
  store: SessionStore;
  fieldsPath: string;
  maxUploadBytes: number;
};

// Invalid UTF-8 sequences become U+FFFD instead of failing the upload.
const decodeUpload = (bytes: Uint8Array): string => new TextDecoder("utf-8").decode(bytes);

export const createUploadHandler =
  ({ store, fieldsPath, maxUploadBytes }: UploadHandlerOptions) =>
  async (req: ApiRequest, res: ApiResponse) => {
    const requestId = createRequestId();
    const log = createRouteLogger("upload");
    const sessionKey = sessionKeyFrom(req);

    if (req.method !== "POST") {
      log.start({ requestId, method: req.method, sessionKey, bytes: null });
      return jsonResponse(res, 405, { ok: false, error: "Method Not Allowed", requestId });
    }

    try {
      const bytes = await readRawBody(req, maxUploadBytes);
      log.start({ requestId, method: req.method, sessionKey, bytes: bytes.length });

      const fieldNames = await loadFieldNames(fieldsPath);
      const upload = prepareDeviceUpload(decodeUpload(bytes), fieldNames);
      store.set(sessionKey, upload.table);

      const result: UploadResult = {
        headers: upload.table.headers,
        start_nr: upload.startNr,
        primary_score: upload.primaryScore,
        secondary_score: upload.secondaryScore,
        row_count: upload.table.rows.length,
        relays: upload.relays,
        start_nrs: upload.startNrs,
        delimiter: upload.delimiter
      };
      log.success({ requestId, sessionKey, rows: result.row_count, columns: result.headers.length });
      return jsonResponse(res, 200, { ok: true, requestId, ...result });
    } catch (error) {
      log.failure(requestId, error);
      const { status, message } = describeError(error);
      return jsonResponse(res, status, { ok: false, error: message, requestId });
    }
  };

export default function handler(req: ApiRequest, res: ApiResponse) {
  const { fieldsPath, maxUploadBytes } = getConfig();
  return createUploadHandler({ store: getSessionStore(), fieldsPath, maxUploadBytes })(req, res);
}
