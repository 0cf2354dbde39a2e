import type { SummaryCell } from "../lib/scores/summarize";

export type UploadResult = {
  headers: string[];
  start_nr: string;
  primary_score: string | null;
  secondary_score: string | null;
  row_count: number;
  relays: string[];
  start_nrs: string[];
  delimiter: string;
};

export type RowFilterRequest = {
  relay?: string | null;
  start_nrs?: string[] | null;
  excluded_indices?: number[] | null;
};

export type SummaryRequest = RowFilterRequest;

export type SummaryResult = {
  summary: Record<string, SummaryCell>[];
  columns: string[];
};

export type ShotsRequest = Omit<RowFilterRequest, "excluded_indices"> & { start_nr: string };

export type ShotPayload = {
  index: number;
  Time: string;
  "Primary score": string;
  "Secondary score": string;
  "Decimal score": number | null;
  "Integer score": number | null;
};

export type ShotsResult = { shots: ShotPayload[] };

export type TargetDataRequest = RowFilterRequest & { start_nr: string };

export type TargetShotPayload = {
  shot_num: number;
  x: number | null;
  y: number | null;
  decimal_score: number | null;
};

export type TargetDataResult = { start_nr: string; shots: TargetShotPayload[] };
