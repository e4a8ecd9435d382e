import { z } from "zod";
import { ConfigError } from "./errors";
import { LOG_LEVELS, type LogLevel } from "./logger";
import type { ServiceName } from "./types";

function blankToUndefined(v: unknown): unknown {
  return typeof v === "string" && v.trim() === "" ? undefined : v;
}

const intVar = (fallback: number, min = 0) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(min).default(fallback)
  );

const urlVar = z.preprocess(
  blankToUndefined,
  z.string({ required_error: "is required" }).url()
);

/**
 * Environment read at boot. Service addresses have no defaults: where each
 * backend listens is a deployment decision.
 */
const EnvSchema = z.object({
  INGESTION_URL: urlVar,
  PREDICTION_URL: urlVar,
  PATIENT_STORE_URL: urlVar,
  HEALTH_TIMEOUT_MS: intVar(2000, 1),
  REQUEST_TIMEOUT_MS: intVar(10000, 1),
  MAX_RETRIES: intVar(3),
  RETRY_INITIAL_DELAY_MS: intVar(1000),
  RETRY_MAX_DELAY_MS: intVar(8000),
  RETRY_FACTOR: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(1).default(2)
  ),
  STARTUP_HEALTH_ATTEMPTS: intVar(5, 1),
  HEALTH_POLL_INTERVAL_MS: intVar(30000),
  BATCH_CONCURRENCY: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).optional()
  ),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  PORT: intVar(3000),
});

export type OrchestratorConfig = {
  services: Record<ServiceName, string>;
  healthTimeoutMs: number;
  requestTimeoutMs: number;
  maxRetries: number;
  backoff: {
    initialDelayMs: number;
    maxDelayMs: number;
    factor: number;
  };
  startupHealthAttempts: number;
  /** 0 disables steady-state polling. */
  healthPollIntervalMs: number;
  batchConcurrency?: number;
  logLevel: LogLevel;
  port: number;
};

/**
 * Validates `env` and maps it to the orchestrator's configuration.
 *
 * @throws ConfigError listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): OrchestratorConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    throw new ConfigError(
      `Invalid environment configuration:\n  ${issues.join("\n  ")}`,
      issues
    );
  }

  const e = parsed.data;
  const config: OrchestratorConfig = {
    services: {
      ingestion: e.INGESTION_URL,
      prediction: e.PREDICTION_URL,
      patient_store: e.PATIENT_STORE_URL,
    },
    healthTimeoutMs: e.HEALTH_TIMEOUT_MS,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    maxRetries: e.MAX_RETRIES,
    backoff: {
      initialDelayMs: e.RETRY_INITIAL_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      factor: e.RETRY_FACTOR,
    },
    startupHealthAttempts: e.STARTUP_HEALTH_ATTEMPTS,
    healthPollIntervalMs: e.HEALTH_POLL_INTERVAL_MS,
    logLevel: e.LOG_LEVEL,
    port: e.PORT,
  };
  if (e.BATCH_CONCURRENCY !== undefined) {
    config.batchConcurrency = e.BATCH_CONCURRENCY;
  }
  return config;
}
