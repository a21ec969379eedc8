import { z } from "zod";
import { ConfigurationError } from "../errors";

export const DEFAULT_DATABASE_PATH = "movies.db";
export const DEFAULT_MOVIES_CSV = "movies.csv";
export const DEFAULT_RATINGS_CSV = "ratings.csv";
export const DEFAULT_BATCH_SIZE = 100;

export const OMDB_BASE_URL = "http://www.omdbapi.com/";
export const OMDB_TIMEOUT_MS = 15000;
export const OMDB_MAX_RETRIES = 2;
export const OMDB_BACKOFF_MS = 1500;
export const OMDB_CONCURRENCY = 4;

export const NO_GENRES_SENTINEL = "(no genres listed)";
export const UNKNOWN_DIRECTOR = "(Unknown)";

export interface OmdbSettings {
  enabled: boolean;
  apiKey: string | null;
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
  concurrency: number;
}

export interface EtlConfig {
  databasePath: string;
  moviesCsv: string;
  ratingsCsv: string;
  batchSize: number;
  dedupeTitles: boolean;
  logLevel: string;
  omdb: OmdbSettings;
}

declare global {
  namespace TsED {
    interface Configuration {
      etl: EtlConfig;
    }
  }
}

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default(DEFAULT_DATABASE_PATH),
  MOVIES_CSV: z.string().min(1).default(DEFAULT_MOVIES_CSV),
  RATINGS_CSV: z.string().min(1).default(DEFAULT_RATINGS_CSV),
  BATCH_SIZE: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
  DEDUPE_TITLES: flag(true),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "off"]).default("info"),
  USE_OMDB: flag(true),
  OMDB_API_KEY: z.string().optional(),
  OMDB_BASE_URL: z.string().url().default(OMDB_BASE_URL),
  OMDB_TIMEOUT_MS: z.coerce.number().int().positive().default(OMDB_TIMEOUT_MS),
  OMDB_MAX_RETRIES: z.coerce.number().int().min(0).default(OMDB_MAX_RETRIES),
  OMDB_BACKOFF_MS: z.coerce.number().int().min(0).default(OMDB_BACKOFF_MS),
  OMDB_CONCURRENCY: z.coerce.number().int().positive().default(OMDB_CONCURRENCY),
});

/**
 * Builds the run configuration from environment variables. Empty strings
 * count as unset so a blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EtlConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const vars = parsed.data;
  return {
    databasePath: vars.DATABASE_PATH,
    moviesCsv: vars.MOVIES_CSV,
    ratingsCsv: vars.RATINGS_CSV,
    batchSize: vars.BATCH_SIZE,
    dedupeTitles: vars.DEDUPE_TITLES,
    logLevel: vars.LOG_LEVEL,
    omdb: {
      enabled: vars.USE_OMDB,
      apiKey: vars.OMDB_API_KEY?.trim() || null,
      baseUrl: vars.OMDB_BASE_URL,
      timeoutMs: vars.OMDB_TIMEOUT_MS,
      maxRetries: vars.OMDB_MAX_RETRIES,
      backoffMs: vars.OMDB_BACKOFF_MS,
      concurrency: vars.OMDB_CONCURRENCY,
    },
  };
}
