import { ServiceClient, type FetchLike } from "./api";
import { BackoffPolicy } from "./backoff";
import { logger as rootLogger, componentLogger, type Logger } from "./logger";
import type { ServiceRegistry } from "./registry";
import { isHealthyBody } from "./schemas";
import type { HealthStatus, ServiceName } from "./types";

export type HealthMap = Partial<Record<ServiceName, boolean>>;

type HealthProbeOptions = {
  registry: ServiceRegistry;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Liveness checks against registered backends.
 *
 * A probe is one `GET /health` with a short timeout. It never retries and
 * never throws for anything the backend does: transport errors, timeouts,
 * non-2xx statuses and unexpected bodies all read as unhealthy. Asking for a
 * service the registry does not know is a deployment error and does throw.
 */
export class HealthProbe {
  private readonly registry: ServiceRegistry;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly clients = new Map<ServiceName, ServiceClient>();

  constructor({
    registry,
    timeoutMs = 2000,
    fetchImpl,
    logger = rootLogger,
    now = () => new Date(),
  }: HealthProbeOptions) {
    this.registry = registry;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl;
    this.log = componentLogger(logger, "health-probe");
    this.now = now;
  }

  private client(service: ServiceName): ServiceClient {
    let client = this.clients.get(service);
    if (!client) {
      client = new ServiceClient({
        service,
        baseUrl: this.registry.resolve(service),
        timeoutMs: this.timeoutMs,
        fetchImpl: this.fetchImpl,
      });
      this.clients.set(service, client);
    }
    return client;
  }

  async probe(service: ServiceName, signal?: AbortSignal): Promise<HealthStatus> {
    const client = this.client(service);
    let healthy = false;
    try {
      const { body } = await client.requestJson(
        "/health",
        { method: "GET" },
        { signal, timeoutMs: this.timeoutMs }
      );
      healthy = isHealthyBody(body);
      if (!healthy) {
        this.log.warn({ service }, "health endpoint reported not healthy");
      }
    } catch (err) {
      this.log.warn({ service, err }, "health probe failed");
    }
    return { service, healthy, checkedAt: this.now().toISOString() };
  }

  async isHealthy(service: ServiceName, signal?: AbortSignal): Promise<boolean> {
    const status = await this.probe(service, signal);
    return status.healthy;
  }

  /**
   * Probes every service at once; resolves when the slowest probe settles.
   */
  async statusOf(
    services: ServiceName[] = this.registry.names(),
    signal?: AbortSignal
  ): Promise<HealthStatus[]> {
    const unique = Array.from(new Set(services));
    return Promise.all(unique.map((s) => this.probe(s, signal)));
  }

  async checkAll(
    services: ServiceName[] = this.registry.names(),
    signal?: AbortSignal
  ): Promise<HealthMap> {
    const statuses = await this.statusOf(services, signal);
    const out: HealthMap = {};
    for (const s of statuses) out[s.service] = s.healthy;
    return out;
  }

  /**
   * Startup gate: re-checks unhealthy services until all are healthy or
   * `attempts` rounds have run, sleeping per `backoff` between rounds.
   */
  async waitUntilHealthy(
    services: ServiceName[],
    {
      attempts = 5,
      backoff = new BackoffPolicy(),
      signal,
    }: { attempts?: number; backoff?: BackoffPolicy; signal?: AbortSignal } = {}
  ): Promise<{ healthy: boolean; statuses: HealthStatus[]; rounds: number }> {
    const latest = new Map<ServiceName, HealthStatus>();
    let pending = Array.from(new Set(services));
    let rounds = 0;

    while (pending.length > 0 && rounds < Math.max(attempts, 1)) {
      if (rounds > 0) await backoff.wait(rounds, signal);
      rounds += 1;

      const statuses = await this.statusOf(pending, signal);
      for (const s of statuses) latest.set(s.service, s);
      pending = statuses.filter((s) => !s.healthy).map((s) => s.service);

      if (pending.length > 0) {
        this.log.info(
          { round: rounds, unhealthy: pending },
          "waiting for services to become healthy"
        );
      }
    }

    return {
      healthy: pending.length === 0,
      statuses: Array.from(latest.values()),
      rounds,
    };
  }
}

type HealthMonitorOptions = {
  probe: HealthProbe;
  services: ServiceName[];
  intervalMs: number;
  onChange?: (status: HealthStatus, previous: HealthStatus | undefined) => void;
  logger?: Logger;
};

/**
 * Steady-state polling. Keeps the latest status per service and reports
 * transitions between healthy and unhealthy.
 */
export class HealthMonitor {
  private readonly probe: HealthProbe;
  private readonly services: ServiceName[];
  private readonly intervalMs: number;
  private readonly onChange?: HealthMonitorOptions["onChange"];
  private readonly log: Logger;
  private readonly latest = new Map<ServiceName, HealthStatus>();
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor({
    probe,
    services,
    intervalMs,
    onChange,
    logger = rootLogger,
  }: HealthMonitorOptions) {
    this.probe = probe;
    this.services = services;
    this.intervalMs = intervalMs;
    this.onChange = onChange;
    this.log = componentLogger(logger, "health-monitor");
  }

  /**
   * Stores statuses without notifying; used to seed from the startup gate.
   */
  seed(statuses: HealthStatus[]): void {
    for (const s of statuses) this.latest.set(s.service, s);
  }

  /**
   * One polling round.
   */
  async tick(): Promise<HealthStatus[]> {
    const statuses = await this.probe.statusOf(this.services);
    for (const status of statuses) {
      const previous = this.latest.get(status.service);
      this.latest.set(status.service, status);
      if (previous !== undefined && previous.healthy === status.healthy) {
        continue;
      }
      if (!status.healthy) {
        this.log.warn({ service: status.service }, "service became unhealthy");
      } else if (previous !== undefined) {
        this.log.info({ service: status.service }, "service recovered");
      }
      this.onChange?.(status, previous);
    }
    return statuses;
  }

  snapshot(): HealthStatus[] {
    return Array.from(this.latest.values());
  }

  unhealthy(): ServiceName[] {
    return this.snapshot()
      .filter((s) => !s.healthy)
      .map((s) => s.service);
  }

  start(): void {
    if (this.running || this.intervalMs <= 0) return;
    this.running = true;
    this.schedule();
  }

  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  private schedule(): void {
    this.timer = setTimeout(() => void this.poll(), this.intervalMs);
    this.timer.unref();
  }

  private async poll(): Promise<void> {
    try {
      await this.tick();
    } catch (err) {
      this.log.error({ err }, "health poll failed");
    }
    if (this.running) this.schedule();
  }
}
