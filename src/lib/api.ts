import type {
  ShotsRequest,
  ShotsResult,
  SummaryRequest,
  SummaryResult,
  TargetDataRequest,
  TargetDataResult,
  UploadResult
} from "../types/scoreApi";

const TAB_ID_KEY = "score-tab-id";

const createTabId = (): string => {
  try {
    return crypto.randomUUID();
  } catch {
    return `tab-${Math.random().toString(36).slice(2, 10)}`;
  }
};

// One server-side table per browser tab.
export const getTabId = (): string => {
  const existing = window.sessionStorage.getItem(TAB_ID_KEY);
  if (existing) {
    return existing;
  }
  const tabId = createTabId();
  window.sessionStorage.setItem(TAB_ID_KEY, tabId);
  return tabId;
};

type Envelope = { ok: boolean; error?: string };

const handleResponse = async <T>(response: Response): Promise<T> => {
  let payload: Envelope & T;
  try {
    payload = await response.json();
  } catch {
    throw new Error(`Request failed (${response.status})`);
  }
  if (!payload.ok) {
    throw new Error(payload.error || `Request failed (${response.status})`);
  }
  return payload;
};

const postJson = async <T>(path: string, body: unknown): Promise<T> => {
  const response = await fetch(path, {
    method: "POST",
    headers: { "Content-Type": "application/json", "X-Tab-ID": getTabId() },
    body: JSON.stringify(body)
  });
  return handleResponse<T>(response);
};

export const uploadExport = async (file: File): Promise<UploadResult> => {
  const response = await fetch("/api/upload", {
    method: "POST",
    headers: { "Content-Type": "application/octet-stream", "X-Tab-ID": getTabId() },
    body: file
  });
  return handleResponse<UploadResult>(response);
};

export const requestSummary = (payload: SummaryRequest): Promise<SummaryResult> =>
  postJson<SummaryResult>("/api/summary", payload);

export const requestShots = (payload: ShotsRequest): Promise<ShotsResult> =>
  postJson<ShotsResult>("/api/shots", payload);

export const requestTargetData = (payload: TargetDataRequest): Promise<TargetDataResult> =>
  postJson<TargetDataResult>("/api/target-data", payload);
