export type ScoreDataErrorCode =
  | "EMPTY_FILE"
  | "NO_COLUMNS"
  | "MISSING_FIELD_LIST"
  | "MISSING_COLUMN"
  | "NO_TABLE"
  | "INVALID_REQUEST";

export class ScoreDataError extends Error {
  code: ScoreDataErrorCode;

  constructor(code: ScoreDataErrorCode, message: string) {
    super(message);
    this.name = "ScoreDataError";
    this.code = code;
  }
}

export const isScoreDataError = (error: unknown): error is ScoreDataError =>
  error instanceof ScoreDataError;
