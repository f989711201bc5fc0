import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { AlertThresholds, LoggerPort, LogLevel, MetricName, ThresholdRange } from '@vehicle-dash/domain';
import { ConfigError, METRIC_NAMES, isMetricName } from '@vehicle-dash/domain';
import { LOG_LEVELS } from '@vehicle-dash/adapters';

/**
 * Dashboard configuration.
 *
 * Precedence: environment (after dotenv) > JSON config file > defaults.
 *
 * Env vars:
 *   DASHBOARD_CONFIG            JSON config file (default: dashboard.config.json)
 *   REFRESH_INTERVAL_SECONDS    presentation tick period (default: 0.5)
 *   HISTORY_CAPACITY            readings kept per metric (default: 20)
 *   MAX_TICKS                   stop after N ticks, 0 = run until signalled (default: 0)
 *   STALE_AFTER_SECONDS         age at which data renders as stale, 0 = never (default: 5)
 *   LOG_LEVEL                   debug | info | warn | error (default: info)
 *   LOG_FILE                    NDJSON frame log, empty disables (default: dashboard.log)
 *   HTTP_PORT                   enables the HTTP/WebSocket surface when set
 *   DATABASE_URL                enables the Postgres reading archive when set
 *   TELEMETRY_SOURCE            simulator | http-poll | http-push (default: simulator)
 *   TELEMETRY_URL               endpoint for http-poll
 *   TELEMETRY_POLL_INTERVAL_MS  http-poll period (default: 1000)
 *   SIM_SEED                    simulator RNG seed (default: 42)
 *   SIM_INTERVAL_MS             simulator sample period (default: 500)
 *   SIM_INITIAL_SPEED_KPH       simulator starting speed (default: 120)
 *   SIM_FAILURE_RATE            probability a simulator poll fails (default: 0)
 */

export type TelemetryConfig =
  | { kind: 'simulator'; seed: number; intervalMs: number; initialSpeedKph: number; failureRate: number }
  | { kind: 'http-poll'; url: string; intervalMs: number }
  | { kind: 'http-push' };

export interface DashboardConfig {
  configFile: string;
  refreshIntervalMs: number;
  historyCapacity: number;
  alertThresholds: AlertThresholds;
  maxTicks: number;
  staleAfterMs: number;
  logLevel: LogLevel;
  logFile: string | null;
  httpPort: number | null;
  databaseUrl: string | null;
  telemetry: TelemetryConfig;
}

export const DEFAULT_THRESHOLDS: AlertThresholds = {
  speedKph: { max: 110 },
  rpm: { max: 6000 },
  batteryPct: { min: 10 },
  engineTempC: { max: 110 },
  fuelPct: { min: 5 },
};

const DEFAULTS = {
  refreshIntervalSeconds: 0.5,
  historyCapacity: 20,
  maxTicks: 0,
  staleAfterSeconds: 5,
};

// ─── Schemas ──────────────────────────────────────────────────────────────────

const thresholdRangeSchema = z
  .object({ min: z.number().optional(), max: z.number().optional() })
  .strict()
  .refine((r) => r.min === undefined || r.max === undefined || r.min <= r.max, {
    message: 'min must not exceed max',
  });

const thresholdsSchema = z.record(z.string(), thresholdRangeSchema).superRefine((rec, ctx) => {
  for (const key of Object.keys(rec)) {
    if (!isMetricName(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `unknown metric, expected one of ${METRIC_NAMES.join(', ')}`,
      });
    }
  }
});

export const configFileSchema = z
  .object({
    refresh_interval_seconds: z.number().positive().optional(),
    history_capacity: z.number().int().positive().optional(),
    alert_thresholds: thresholdsSchema.optional(),
    max_ticks: z.number().int().nonnegative().optional(),
    stale_after_seconds: z.number().nonnegative().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Blank env values count as unset */
const blank = (v: unknown) => (v === '' ? undefined : v);
const envNumber = (schema: z.ZodNumber) => z.preprocess(blank, schema.optional());
const envString = () => z.preprocess(blank, z.string().optional());

const envSchema = z.object({
  DASHBOARD_CONFIG: envString(),
  REFRESH_INTERVAL_SECONDS: envNumber(z.coerce.number().positive()),
  HISTORY_CAPACITY: envNumber(z.coerce.number().int().positive()),
  MAX_TICKS: envNumber(z.coerce.number().int().nonnegative()),
  STALE_AFTER_SECONDS: envNumber(z.coerce.number().nonnegative()),
  LOG_LEVEL: z.preprocess(blank, z.enum(LOG_LEVELS).optional()),
  // LOG_FILE='' is meaningful (disables the log), so it is not blanked
  LOG_FILE: z.string().optional(),
  HTTP_PORT: envNumber(z.coerce.number().int().min(1).max(65535)),
  DATABASE_URL: envString(),
  TELEMETRY_SOURCE: z.preprocess(blank, z.enum(['simulator', 'http-poll', 'http-push']).optional()),
  TELEMETRY_URL: envString(),
  TELEMETRY_POLL_INTERVAL_MS: envNumber(z.coerce.number().int().positive()),
  SIM_SEED: envNumber(z.coerce.number().int()),
  SIM_INTERVAL_MS: envNumber(z.coerce.number().int().positive()),
  SIM_INITIAL_SPEED_KPH: envNumber(z.coerce.number().nonnegative()),
  SIM_FAILURE_RATE: envNumber(z.coerce.number().min(0).max(1)),
});

type EnvConfig = z.infer<typeof envSchema>;

// ─── Loading ──────────────────────────────────────────────────────────────────

function formatIssues(err: z.ZodError): string {
  return err.errors.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

function toThresholds(rec: Record<string, ThresholdRange>): AlertThresholds {
  const out: Partial<Record<MetricName, ThresholdRange>> = {};
  for (const [key, range] of Object.entries(rec)) {
    if (isMetricName(key)) out[key] = range;
  }
  return out;
}

/**
 * Reads the JSON config file. A missing or unusable file is not fatal:
 * it is logged and the built-in defaults apply.
 */
export function readConfigFile(filePath: string, logger: LoggerPort): ConfigFile {
  if (!fs.existsSync(filePath)) {
    logger.warn(`config file "${filePath}" not found, using default settings and thresholds`);
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    logger.error(`cannot read config file "${filePath}": ${detail}; using default settings and thresholds`);
    return {};
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    logger.error(`invalid config file "${filePath}": ${formatIssues(parsed.error)}; using default settings and thresholds`);
    return {};
  }
  return parsed.data;
}

function telemetryConfig(env: EnvConfig): TelemetryConfig {
  switch (env.TELEMETRY_SOURCE ?? 'simulator') {
    case 'http-poll':
      if (!env.TELEMETRY_URL) throw new ConfigError('TELEMETRY_SOURCE=http-poll requires TELEMETRY_URL');
      return { kind: 'http-poll', url: env.TELEMETRY_URL, intervalMs: env.TELEMETRY_POLL_INTERVAL_MS ?? 1000 };
    case 'http-push':
      if (env.HTTP_PORT === undefined) throw new ConfigError('TELEMETRY_SOURCE=http-push requires HTTP_PORT');
      return { kind: 'http-push' };
    case 'simulator':
      return {
        kind: 'simulator',
        seed: env.SIM_SEED ?? 42,
        intervalMs: env.SIM_INTERVAL_MS ?? 500,
        initialSpeedKph: env.SIM_INITIAL_SPEED_KPH ?? 120,
        failureRate: env.SIM_FAILURE_RATE ?? 0,
      };
  }
}

/** Throws ConfigError when an environment value is invalid. */
export function loadConfig(
  env: Record<string, string | undefined>,
  logger: LoggerPort,
  cwd: string = process.cwd(),
): DashboardConfig {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError(`invalid environment: ${formatIssues(parsedEnv.error)}`);
  }
  const e = parsedEnv.data;

  const configFile = path.resolve(cwd, e.DASHBOARD_CONFIG ?? 'dashboard.config.json');
  const file = readConfigFile(configFile, logger);
  const logFile = e.LOG_FILE ?? 'dashboard.log';

  return {
    configFile,
    refreshIntervalMs:
      (e.REFRESH_INTERVAL_SECONDS ?? file.refresh_interval_seconds ?? DEFAULTS.refreshIntervalSeconds) * 1000,
    historyCapacity: e.HISTORY_CAPACITY ?? file.history_capacity ?? DEFAULTS.historyCapacity,
    alertThresholds: { ...DEFAULT_THRESHOLDS, ...toThresholds(file.alert_thresholds ?? {}) },
    maxTicks: e.MAX_TICKS ?? file.max_ticks ?? DEFAULTS.maxTicks,
    staleAfterMs: (e.STALE_AFTER_SECONDS ?? file.stale_after_seconds ?? DEFAULTS.staleAfterSeconds) * 1000,
    logLevel: e.LOG_LEVEL ?? 'info',
    logFile: logFile === '' ? null : path.resolve(cwd, logFile),
    httpPort: e.HTTP_PORT ?? null,
    databaseUrl: e.DATABASE_URL ?? null,
    telemetry: telemetryConfig(e),
  };
}

/** One-line threshold summary logged at startup */
export function describeThresholds(thresholds: AlertThresholds): string {
  const parts: string[] = [];
  for (const metric of METRIC_NAMES) {
    const range = thresholds[metric];
    if (!range) continue;
    if (range.min !== undefined) parts.push(`${metric} < ${range.min}`);
    if (range.max !== undefined) parts.push(`${metric} > ${range.max}`);
  }
  return parts.length > 0 ? `alert when ${parts.join(', ')}` : 'no alert thresholds configured';
}
