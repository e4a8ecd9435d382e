import type { ErrorCode, ErrorDetail, ServiceName } from "./types";

/**
 * Base class for every error the orchestrator raises.
 *
 * `code` is stable and machine-readable; `details` carries whatever context
 * the raising site had (service, path, status, ...).
 */
export class OrchestrationError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/**
 * Connection refused, DNS failure, timeout.
 */
export class TransportError extends OrchestrationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("TRANSPORT_ERROR", message, details);
  }
}

/**
 * The caller's abort signal fired while a call was in flight or about to
 * start.
 */
export class CancelledError extends OrchestrationError {
  constructor(message = "Operation cancelled", details: Record<string, unknown> = {}) {
    super("CANCELLED", message, details);
  }
}

/**
 * The backend answered with a non-2xx status.
 */
export class ProtocolError extends OrchestrationError {
  readonly status: number;

  constructor(
    status: number,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super("PROTOCOL_ERROR", message, { ...details, status });
    this.status = status;
  }
}

/**
 * The backend answered 2xx but the body is malformed or out of range.
 */
export class ValidationError extends OrchestrationError {
  readonly issues: string[];

  constructor(
    message: string,
    issues: string[] = [],
    details: Record<string, unknown> = {}
  ) {
    super("VALIDATION_ERROR", message, { ...details, issues });
    this.issues = issues;
  }
}

export class UnknownServiceError extends OrchestrationError {
  constructor(service: string) {
    super("UNKNOWN_SERVICE", `Unknown service: ${service}`, { service });
  }
}

/**
 * Raised by the health gate when work cannot be admitted.
 */
export class ServicesUnavailableError extends OrchestrationError {
  readonly services: ServiceName[];

  constructor(services: ServiceName[]) {
    super(
      "SERVICES_UNAVAILABLE",
      `Services not healthy: ${services.join(", ")}`,
      { services }
    );
    this.services = services;
  }
}

/**
 * Work was submitted before the health gate ever passed.
 */
export class NotStartedError extends OrchestrationError {
  constructor() {
    super(
      "NOT_STARTED",
      "Orchestrator not started: call start() before submitting work"
    );
  }
}

export class ConfigError extends OrchestrationError {
  constructor(message: string, issues: string[]) {
    super("CONFIG_ERROR", message, { issues });
  }
}

/**
 * Converts any thrown value into the JSON-safe shape stored in a failure.
 */
export function toErrorDetail(err: unknown): ErrorDetail {
  if (err instanceof ProtocolError) {
    return { code: err.code, message: err.message, status: err.status };
  }
  if (err instanceof OrchestrationError) {
    return { code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { code: "UNEXPECTED", message: err.message };
  }
  return { code: "UNEXPECTED", message: String(err) };
}
