import { fileURLToPath } from "node:url";
import { z } from "zod";

const envSchema = z.object({
  SCORE_FIELDS_PATH: z.string().trim().min(1).optional(),
  SESSION_TTL_HOURS: z.coerce.number().positive().default(24),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
  PORT: z.coerce.number().int().min(1).max(65535).optional()
});

export type AppConfig = {
  fieldsPath: string;
  sessionTtlMs: number;
  maxUploadBytes: number;
  host: string;
  port: number;
  openBrowser: boolean;
};

const DEFAULT_PORT = 5000;

export const defaultFieldsPath = (): string =>
  fileURLToPath(new URL("../../config/SIUSFields.txt", import.meta.url));

const blankToUndefined = (env: Record<string, string | undefined>) =>
  Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, value?.trim() ? value : undefined])
  );

/**
 * Reads the server settings from the environment. Without PORT the app runs
 * in local mode: loopback only, browser opened on start.
 */
export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const values = parsed.data;
  const local = values.PORT === undefined;
  return {
    fieldsPath: values.SCORE_FIELDS_PATH ?? defaultFieldsPath(),
    sessionTtlMs: values.SESSION_TTL_HOURS * 60 * 60 * 1000,
    maxUploadBytes: Math.round(values.MAX_UPLOAD_MB * 1024 * 1024),
    host: local ? "127.0.0.1" : "0.0.0.0",
    port: values.PORT ?? DEFAULT_PORT,
    openBrowser: local
  };
};

let cached: AppConfig | null = null;

export const getConfig = (): AppConfig => {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
};
