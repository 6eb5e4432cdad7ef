import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const intFromEnv = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const positiveIntFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const secondsToMs = (fallback: number) =>
  z.coerce.number().nonnegative().default(fallback).transform((seconds) => Math.round(seconds * 1000));

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DATAFORDELER_API_KEY: z.string().min(1),
  BBR_GRAPHQL_URL: z.string().url().default("https://graphql.datafordeler.dk/BBR/v1"),
  DAWA_API_URL: z.string().url().default("https://api.dataforsyningen.dk"),
  SYNC_SLOT: z.string().min(1).default("bbr-shelters"),

  BATCH_SIZE: positiveIntFromEnv(200),
  PAGE_SIZE: positiveIntFromEnv(500),
  ADDRESS_REFRESH_DAYS: intFromEnv(90),
  MAX_GRAPHQL_RETRIES: positiveIntFromEnv(8),
  GRAPHQL_RETRY_BASE_SLEEP: secondsToMs(5),
  GRAPHQL_PAGE_SLEEP: secondsToMs(0.2),
  DAR_SLEEP_TIME: secondsToMs(0.1),
  SAFE_THRESHOLD: intFromEnv(500),
  MIN_DELETE_COVERAGE: z.coerce.number().min(0).max(1).default(0.8),
  LOG_PAGE_INTERVAL: z.coerce.number().int().positive().default(10),
  DELETE_AFTER_RESUME: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),

  SUMMARY_PATH: z.string().min(1).optional(),
  GITHUB_STEP_SUMMARY: z.string().min(1).optional(),

  SYNC_CRON: z.string().min(1).default("0 3 * * *"),
  SYNC_TIMEZONE: z.string().min(1).default("Europe/Copenhagen"),
  SYNC_ADMIN_TOKEN: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(5000),
});

/** Tuning knobs for one reconciliation run. Frozen; the engine never reads process.env. */
export interface SyncConfig {
  readonly slot: string;
  readonly pageSize: number;
  readonly batchSize: number;
  readonly addressRefreshDays: number;
  readonly maxRetries: number;
  readonly retryBaseMs: number;
  readonly pageDelayMs: number;
  readonly enrichmentDelayMs: number;
  readonly safeThreshold: number;
  readonly minCoverage: number;
  /** Allow soft deletes after a pass that started from a saved cursor, if coverage holds. */
  readonly deleteAfterResume: boolean;
  readonly logPageInterval: number;
  readonly snapshotPageSize: number;
  readonly snapshotAttempts: number;
  readonly snapshotBackoffMs: number;
  readonly patchChunkSize: number;
}

export interface AppConfig {
  readonly databaseUrl: string;
  readonly source: { readonly url: string; readonly apiKey: string };
  readonly address: { readonly url: string };
  readonly sync: SyncConfig;
  readonly reporting: { readonly summaryPath?: string; readonly stepSummaryPath?: string };
  readonly server: {
    readonly port: number;
    readonly adminToken?: string;
    readonly cron: string;
    readonly timezone: string;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export const DEFAULT_SYNC_CONFIG: SyncConfig = Object.freeze({
  slot: "bbr-shelters",
  pageSize: 500,
  batchSize: 200,
  addressRefreshDays: 90,
  maxRetries: 8,
  retryBaseMs: 5000,
  pageDelayMs: 200,
  enrichmentDelayMs: 100,
  safeThreshold: 500,
  minCoverage: 0.8,
  deleteAfterResume: false,
  logPageInterval: 10,
  snapshotPageSize: 1000,
  snapshotAttempts: 3,
  snapshotBackoffMs: 2000,
  patchChunkSize: 100,
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const e = parsed.data;

  const sync: SyncConfig = Object.freeze({
    ...DEFAULT_SYNC_CONFIG,
    slot: e.SYNC_SLOT,
    pageSize: e.PAGE_SIZE,
    batchSize: e.BATCH_SIZE,
    addressRefreshDays: e.ADDRESS_REFRESH_DAYS,
    maxRetries: e.MAX_GRAPHQL_RETRIES,
    retryBaseMs: e.GRAPHQL_RETRY_BASE_SLEEP,
    pageDelayMs: e.GRAPHQL_PAGE_SLEEP,
    enrichmentDelayMs: e.DAR_SLEEP_TIME,
    safeThreshold: e.SAFE_THRESHOLD,
    minCoverage: e.MIN_DELETE_COVERAGE,
    deleteAfterResume: e.DELETE_AFTER_RESUME,
    logPageInterval: e.LOG_PAGE_INTERVAL,
  });

  return Object.freeze({
    databaseUrl: e.DATABASE_URL,
    source: Object.freeze({ url: e.BBR_GRAPHQL_URL, apiKey: e.DATAFORDELER_API_KEY }),
    address: Object.freeze({ url: e.DAWA_API_URL }),
    sync,
    reporting: Object.freeze({ summaryPath: e.SUMMARY_PATH, stepSummaryPath: e.GITHUB_STEP_SUMMARY }),
    server: Object.freeze({
      port: e.PORT,
      adminToken: e.SYNC_ADMIN_TOKEN,
      cron: e.SYNC_CRON,
      timezone: e.SYNC_TIMEZONE,
    }),
  });
}
