import pino, { type Logger, type LoggerOptions } from "pino";

/**
 * Genomic and clinical payloads never reach the logs, at any depth we log.
 */
const REDACTED_FIELDS = [
  "genomic_data",
  "genomicData",
  "medical_history",
  "medicalHistory",
];

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * `LOG_LEVEL` from the environment, or "info" when unset or not a pino
 * level. Reported properly by `loadConfig`; here it must not throw.
 */
export function levelFromEnv(
  env: Record<string, string | undefined> = process.env
): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === raw) ?? "info";
}

export type CreateLoggerOptions = {
  name: string;
  level?: LogLevel;
};

export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = levelFromEnv() } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: {
      paths: REDACTED_FIELDS.flatMap((f) => [f, `*.${f}`, `*.*.${f}`]),
      censor: "[REDACTED]",
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return pino(loggerOptions);
}

/**
 * Child logger tagged with the emitting component.
 */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}

export const logger = createLogger({ name: "genomic-orchestrator" });

export type { Logger };
