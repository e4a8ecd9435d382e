import { readFileSync, writeFileSync } from "node:fs";
import { pathToFileURL } from "node:url";
import type { FetchLike } from "./api";
import type { SleepFn } from "./backoff";
import { loadConfig, type OrchestratorConfig } from "./config";
import { OrchestrationError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { Orchestrator } from "./orchestrator";
import {
  batchReportPayload,
  retryOutcomePayload,
  summarizeBatch,
  type BatchReportPayload,
  type RetryOutcomePayload,
} from "./report";
import {
  BatchRequestSchema,
  RetryRequestSchema,
  RetrySectionSchema,
  parseOrThrow,
  type RetryCandidate,
} from "./schemas";
import type { PatientId } from "./types";

type Env = Record<string, string | undefined>;

const USAGE = `Usage:
  npm run cli -- --check
  npm run cli -- --batch <patients.json> [--retry] [--out <file>]
  npm run cli -- --retryFrom <report.json> [--out <file>]

Options:
  --ingestionUrl, --predictionUrl, --patientStoreUrl   backend addresses
  --maxRetries <n>     retry budget per failed unit
  --concurrency <n>    cap on units in flight
  --skipHealth         do not gate on backend health before running

Exit codes: 0 all units succeeded, 1 error, 2 some units failed.`;

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--maxRetries 5`
 * - `--maxRetries=5`
 *
 * Returns `null` if the flag is not present or has no value.
 */
export function getArgValue(argv: string[], flag: string): string | null {
  const idx = argv.findIndex((a) => a === flag || a.startsWith(`${flag}=`));
  if (idx === -1) return null;
  const a = argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

/**
 * Checks whether argv includes a boolean flag (`--retry` or `--retry=...`).
 */
export function hasFlag(argv: string[], flag: string): boolean {
  return argv.some((a) => a === flag || a.startsWith(`${flag}=`));
}

/**
 * Interprets environment variables as booleans.
 *
 * `ORCHESTRATOR_RETRY=1 npm run cli -- --batch x.json` enables the retry pass
 * even where the shell drops the `--retry` flag.
 */
function envFlag(env: Env, name: string): boolean {
  const v = env[name];
  if (!v) return false;
  return v === "1" || v.toLowerCase() === "true" || v.toLowerCase() === "yes";
}

const FLAG_ENV: Record<string, string> = {
  "--ingestionUrl": "INGESTION_URL",
  "--predictionUrl": "PREDICTION_URL",
  "--patientStoreUrl": "PATIENT_STORE_URL",
  "--maxRetries": "MAX_RETRIES",
  "--concurrency": "BATCH_CONCURRENCY",
  "--timeoutMs": "REQUEST_TIMEOUT_MS",
};

/**
 * Environment configuration with command-line flags taking precedence.
 */
export function configFromArgs(argv: string[], env: Env): OrchestratorConfig {
  const overrides: Env = {};
  for (const [flag, name] of Object.entries(FLAG_ENV)) {
    const v = getArgValue(argv, flag);
    if (v !== null) overrides[name] = v;
  }
  return loadConfig({ ...env, ...overrides });
}

function resultsFileName(now: Date): string {
  const iso = now.toISOString();
  const stamp = `${iso.slice(0, 10).replace(/-/g, "")}_${iso
    .slice(11, 19)
    .replace(/:/g, "")}`;
  return `results_${stamp}.json`;
}

function readJsonFile(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf8"));
}

type RetryPlan = {
  candidates: RetryCandidate[];
  maxRetries: number | undefined;
  /** Units the report already gave up on; they stay failed. */
  exhausted: Set<PatientId>;
};

/**
 * Reads the failed list of an earlier report (`{ failed }`, or the
 * `{ batch, retry? }` file this CLI writes). Units named in the `retry`
 * section already recovered or were finalized and are left out.
 */
function planRetry(path: string): RetryPlan {
  const raw = readJsonFile(path);
  const source =
    typeof raw === "object" && raw !== null && "batch" in raw ? raw.batch : raw;
  const request = parseOrThrow(RetryRequestSchema, source, `report file ${path}`);

  const recovered = new Set<PatientId>();
  const exhausted = new Set<PatientId>();
  if (typeof raw === "object" && raw !== null && "retry" in raw) {
    const section = parseOrThrow(
      RetrySectionSchema,
      raw.retry,
      `retry section of ${path}`
    );
    for (const u of section.retried) recovered.add(u.patient_id);
    for (const u of section.failed_final) exhausted.add(u.patient_id);
  }

  return {
    candidates: request.failed.filter(
      (c) => !recovered.has(c.patientId) && !exhausted.has(c.patientId)
    ),
    maxRetries: request.max_retries,
    exhausted,
  };
}

export type CliDeps = {
  fetchImpl?: FetchLike;
  sleepImpl?: SleepFn;
  logger?: Logger;
  now?: () => Date;
  signal?: AbortSignal;
};

type CliOutput = {
  batch?: BatchReportPayload;
  retry?: RetryOutcomePayload;
};

/**
 * CLI entrypoint. Returns the process exit code.
 *
 * Batch pipeline:
 * 1) Load configuration (environment, then flags).
 * 2) Gate on backend health unless `--skipHealth`.
 * 3) Run every record of the batch file concurrently.
 * 4) Optionally re-drive the failed subset (`--retry`).
 * 5) Write the report JSON to `--out`.
 */
export async function runCli(
  argv: string[] = process.argv.slice(2),
  env: Env = process.env,
  deps: CliDeps = {}
): Promise<number> {
  const now = deps.now ?? (() => new Date());
  const { signal } = deps;

  const skipHealth = hasFlag(argv, "--skipHealth");
  let orchestrator: Orchestrator;
  let config: OrchestratorConfig;
  try {
    config = configFromArgs(argv, env);
    const logger =
      deps.logger ??
      createLogger({ name: "genomic-orchestrator", level: config.logLevel });
    orchestrator = new Orchestrator(config, {
      logger,
      fetchImpl: deps.fetchImpl,
      sleepImpl: deps.sleepImpl,
      now,
      skipHealthGate: skipHealth,
    });
  } catch (err) {
    if (err instanceof OrchestrationError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  if (hasFlag(argv, "--check")) {
    const statuses = await orchestrator.health(signal);
    for (const s of statuses) {
      console.log(`${s.service}: ${s.healthy ? "healthy" : "UNHEALTHY"}`);
    }
    return statuses.every((s) => s.healthy) ? 0 : 1;
  }

  const batchPath = getArgValue(argv, "--batch");
  const retryFrom = getArgValue(argv, "--retryFrom");
  if (!batchPath && !retryFrom) {
    console.error(USAGE);
    return 1;
  }

  const outPath = getArgValue(argv, "--out") || resultsFileName(now());
  const output: CliOutput = {};
  let remainingFailures = 0;

  try {
    let plan: RetryPlan | undefined;
    if (!batchPath && retryFrom) {
      plan = planRetry(retryFrom);
      if (plan.candidates.length === 0) {
        console.log(`Nothing left to retry in ${retryFrom}.`);
        return plan.exhausted.size > 0 ? 2 : 0;
      }
    }

    if (!skipHealth) {
      console.log("Checking backend health ...");
      await orchestrator.start(signal);
    }

    if (batchPath) {
      const records = parseOrThrow(
        BatchRequestSchema,
        readJsonFile(batchPath),
        `batch file ${batchPath}`
      );
      console.log(`Processing ${records.length} records from ${batchPath} ...`);
      const report = await orchestrator.runBatch(records, signal);
      output.batch = batchReportPayload(report);
      remainingFailures = report.failedCount;
      console.log(summarizeBatch(report));

      const shouldRetry =
        hasFlag(argv, "--retry") || envFlag(env, "ORCHESTRATOR_RETRY");
      if (shouldRetry && report.failed.length > 0) {
        console.log(
          `Retrying ${report.failed.length} failed records (max ${config.maxRetries} attempts) ...`
        );
        const outcome = await orchestrator.retryFailed(
          report.failed,
          config.maxRetries,
          signal
        );
        output.retry = retryOutcomePayload(outcome);
        remainingFailures = outcome.failedFinal.length;
        console.log(
          `Recovered ${outcome.retried.length}, gave up on ${outcome.failedFinal.length}.`
        );
      }
    } else if (plan) {
      if (plan.exhausted.size > 0) {
        console.log(`Skipping ${plan.exhausted.size} records already given up on.`);
      }
      const outcome = await orchestrator.retryFailed(
        plan.candidates,
        plan.maxRetries ?? config.maxRetries,
        signal
      );
      output.retry = retryOutcomePayload(outcome);
      remainingFailures = outcome.failedFinal.length + plan.exhausted.size;
      console.log(
        `Recovered ${outcome.retried.length}, gave up on ${outcome.failedFinal.length}.`
      );
    }
  } catch (err) {
    if (err instanceof OrchestrationError) {
      console.error(`Refusing to run: ${err.message}`);
      return 1;
    }
    throw err;
  } finally {
    orchestrator.stop();
  }

  writeFileSync(outPath, JSON.stringify(output, null, 2), "utf8");
  console.log(`Wrote ${outPath}`);
  return remainingFailures > 0 ? 2 : 0;
}

/**
 * Execute the CLI when this file is run directly; tests import `runCli`.
 */
const invokedDirectly =
  process.argv[1] !== undefined &&
  import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  process.once("SIGTERM", () => controller.abort());

  runCli(process.argv.slice(2), process.env, { signal: controller.signal })
    .then((code) => process.exit(code))
    .catch((err) => {
      console.error("Fatal error:", err);
      process.exit(1);
    });
}
