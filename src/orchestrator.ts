import { BackendGateway, type FetchLike } from "./api";
import { BackoffPolicy, type SleepFn } from "./backoff";
import { BatchCoordinator } from "./batch";
import type { OrchestratorConfig } from "./config";
import { NotStartedError, ServicesUnavailableError } from "./errors";
import { HealthMonitor, HealthProbe } from "./health";
import { logger as rootLogger, componentLogger, type Logger } from "./logger";
import { OrchestratorMetrics } from "./metrics";
import { ServiceRegistry } from "./registry";
import { RetryCoordinator } from "./retry";
import type { RetryCandidate } from "./schemas";
import type {
  BatchReport,
  HealthStatus,
  PatientRecord,
  RetryOutcome,
  ServiceName,
  WorkUnitResult,
} from "./types";
import { WorkflowExecutor, type StateListener } from "./workflow";

export type OrchestratorDeps = {
  fetchImpl?: FetchLike;
  sleepImpl?: SleepFn;
  logger?: Logger;
  now?: () => Date;
  onStateChange?: StateListener;
  onHealthChange?: (status: HealthStatus) => void;
  metrics?: OrchestratorMetrics;
  /**
   * Admit work without a successful `start()`. Backends reported down by
   * the monitor are still refused.
   */
  skipHealthGate?: boolean;
};

/**
 * Wires registry, health probing, the per-unit pipeline and the batch/retry
 * coordinators behind one object.
 *
 * Construction fails with UnknownServiceError if any backend is missing from
 * the configuration. Work is refused with NotStartedError until `start()` has
 * seen every backend healthy; after that, polling continues and work is
 * refused with ServicesUnavailableError while a backend is reported down.
 */
export class Orchestrator {
  readonly registry: ServiceRegistry;
  readonly probe: HealthProbe;
  readonly metrics: OrchestratorMetrics;
  private readonly config: OrchestratorConfig;
  private readonly gateway: BackendGateway;
  private readonly backoff: BackoffPolicy;
  private readonly executor: WorkflowExecutor;
  private readonly batch: BatchCoordinator;
  private readonly retrier: RetryCoordinator;
  private readonly monitor: HealthMonitor;
  private readonly log: Logger;
  private readonly skipHealthGate: boolean;
  private started = false;

  constructor(config: OrchestratorConfig, deps: OrchestratorDeps = {}) {
    const logger = deps.logger ?? rootLogger;
    this.config = config;
    this.log = componentLogger(logger, "orchestrator");
    this.metrics = deps.metrics ?? new OrchestratorMetrics();
    this.skipHealthGate = deps.skipHealthGate ?? false;

    this.registry = new ServiceRegistry(config.services);
    this.registry.assertComplete();

    this.gateway = new BackendGateway({
      registry: this.registry,
      timeoutMs: config.requestTimeoutMs,
      fetchImpl: deps.fetchImpl,
      metrics: this.metrics,
    });
    this.probe = new HealthProbe({
      registry: this.registry,
      timeoutMs: config.healthTimeoutMs,
      fetchImpl: deps.fetchImpl,
      logger,
      now: deps.now,
    });
    this.backoff = new BackoffPolicy({
      ...config.backoff,
      sleepImpl: deps.sleepImpl,
    });
    this.executor = new WorkflowExecutor({
      gateway: this.gateway,
      logger,
      now: deps.now,
      onStateChange: deps.onStateChange,
      metrics: this.metrics,
    });
    this.batch = new BatchCoordinator({
      executor: this.executor,
      concurrency: config.batchConcurrency,
      logger,
    });
    this.retrier = new RetryCoordinator({
      executor: this.executor,
      source: this.gateway,
      backoff: this.backoff,
      logger,
    });
    this.monitor = new HealthMonitor({
      probe: this.probe,
      services: this.registry.names(),
      intervalMs: config.healthPollIntervalMs,
      onChange: deps.onHealthChange,
      logger,
    });
  }

  get isStarted(): boolean {
    return this.started;
  }

  /**
   * Waits for every backend to report healthy, then begins steady-state
   * polling.
   *
   * @throws ServicesUnavailableError naming the backends still down after
   * `startupHealthAttempts` rounds.
   */
  async start(signal?: AbortSignal): Promise<HealthStatus[]> {
    if (this.started) return this.monitor.snapshot();

    const { healthy, statuses, rounds } = await this.probe.waitUntilHealthy(
      this.registry.names(),
      {
        attempts: this.config.startupHealthAttempts,
        backoff: this.backoff,
        signal,
      }
    );
    this.monitor.seed(statuses);

    if (!healthy) {
      const down = this.monitor.unhealthy();
      this.log.error({ unhealthy: down, rounds }, "refusing to start");
      throw new ServicesUnavailableError(down);
    }

    this.monitor.start();
    this.started = true;
    this.log.info({ rounds }, "all services healthy");
    return statuses;
  }

  stop(): void {
    this.monitor.stop();
    this.started = false;
  }

  /**
   * Fresh probe of every backend.
   */
  async health(signal?: AbortSignal): Promise<HealthStatus[]> {
    return this.probe.statusOf(this.registry.names(), signal);
  }

  /**
   * One steady-state polling round, run now. Updates what the admission
   * gate sees.
   */
  async refreshHealth(): Promise<HealthStatus[]> {
    return this.monitor.tick();
  }

  unhealthyServices(): ServiceName[] {
    return this.monitor.unhealthy();
  }

  async processPatient(
    record: PatientRecord,
    signal?: AbortSignal
  ): Promise<WorkUnitResult> {
    this.admit();
    return this.executor.execute(record, signal);
  }

  async runBatch(
    records: PatientRecord[],
    signal?: AbortSignal
  ): Promise<BatchReport> {
    this.admit();
    return this.batch.runBatch(records, signal);
  }

  async retryFailed(
    failures: RetryCandidate[],
    maxRetries: number = this.config.maxRetries,
    signal?: AbortSignal
  ): Promise<RetryOutcome> {
    this.admit();
    return this.retrier.retry(failures, maxRetries, signal);
  }

  private admit(): void {
    if (!this.started && !this.skipHealthGate) throw new NotStartedError();
    const down = this.monitor.unhealthy();
    if (down.length > 0) throw new ServicesUnavailableError(down);
  }
}
