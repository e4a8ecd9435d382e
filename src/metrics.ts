import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import type { ServiceName, WorkUnitResult } from "./types";

export type MetricsOptions = {
  /** Also collect process metrics (CPU, memory, event loop). */
  defaultMetrics?: boolean;
  prefix?: string;
};

/**
 * Outcome label for a backend call: "ok", or the error code that ended it.
 */
export type CallOutcome = string;

/**
 * Prometheus metrics for backend calls and unit results.
 *
 * Each instance owns its registry, so several orchestrators (or tests) never
 * share counters.
 */
export class OrchestratorMetrics {
  readonly registry: Registry;
  private readonly requests: Counter<"service" | "outcome">;
  private readonly latency: Histogram<"service" | "outcome">;
  private readonly active: Gauge<"service">;
  private readonly units: Counter<"status">;
  private readonly unitFailures: Counter<"stage" | "code">;

  constructor({ defaultMetrics = false, prefix = "orchestrator_" }: MetricsOptions = {}) {
    this.registry = new Registry();
    const registers = [this.registry];

    if (defaultMetrics) {
      collectDefaultMetrics({ register: this.registry, prefix });
    }

    /**
     * Backend calls, one per attempt.
     * Labels: service (ingestion/prediction/patient_store), outcome (ok or error code)
     */
    this.requests = new Counter({
      name: `${prefix}requests_total`,
      help: "Backend calls by service and outcome",
      labelNames: ["service", "outcome"],
      registers,
    });

    this.latency = new Histogram({
      name: `${prefix}request_duration_seconds`,
      help: "Backend call duration in seconds",
      labelNames: ["service", "outcome"],
      buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10],
      registers,
    });

    this.active = new Gauge({
      name: `${prefix}active_requests`,
      help: "Backend calls currently in flight",
      labelNames: ["service"],
      registers,
    });

    this.units = new Counter({
      name: `${prefix}units_total`,
      help: "Completed units of work by status",
      labelNames: ["status"],
      registers,
    });

    /**
     * Labels: stage (ingest/predict/persist), code (error taxonomy)
     */
    this.unitFailures = new Counter({
      name: `${prefix}unit_failures_total`,
      help: "Failed units of work by stage and error code",
      labelNames: ["stage", "code"],
      registers,
    });
  }

  /**
   * Marks a call to `service` as in flight. The returned function ends it.
   */
  startRequest(service: ServiceName): (outcome: CallOutcome) => void {
    this.active.inc({ service });
    const endTimer = this.latency.startTimer({ service });
    return (outcome) => {
      this.active.dec({ service });
      this.requests.inc({ service, outcome });
      endTimer({ outcome });
    };
  }

  recordUnit(result: WorkUnitResult): void {
    this.units.inc({ status: result.status });
    if (result.status === "failure") {
      this.unitFailures.inc({ stage: result.stage, code: result.error.code });
    }
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /**
   * Prometheus text exposition format.
   */
  render(): Promise<string> {
    return this.registry.metrics();
  }
}
