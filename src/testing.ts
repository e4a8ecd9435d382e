/**
 * In-process stand-ins for the three backends, used by the tests. Nothing
 * here opens a socket: requests are routed by host, method and path to
 * handlers that build `Response` objects directly.
 */
import type { FetchLike } from "./api";
import type { OrchestratorConfig } from "./config";
import { SERVICE_NAMES, type PatientRecord, type ServiceName } from "./types";

export const TEST_SERVICES: Record<ServiceName, string> = {
  ingestion: "http://ingestion.test",
  prediction: "http://prediction.test",
  patient_store: "http://store.test",
};

export type StubRequest = {
  service: ServiceName;
  method: string;
  path: string;
  body: unknown;
  signal: AbortSignal | undefined;
};

export type StubHandler = (req: StubRequest) => Response | Promise<Response>;

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

/**
 * Never settles on its own; rejects once `signal` aborts, like a backend that
 * accepted the connection and then went silent.
 */
export function hang(signal: AbortSignal | undefined): Promise<Response> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(new Error("aborted")), {
      once: true,
    });
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const DEFAULT_PREDICTION = {
  recommended_treatment: "therapy-x",
  efficacy: 0.8,
  confidence_level: "high",
};

export function makeRecord(id: string, marker = id): PatientRecord {
  return {
    id,
    genomicData: { marker },
    medicalHistory: { conditions: ["hypertension"] },
  };
}

type Route = {
  service: ServiceName;
  method: string;
  path: string | RegExp;
  handler: StubHandler;
};

function serviceFor(origin: string): ServiceName | undefined {
  return SERVICE_NAMES.find((name) => TEST_SERVICES[name] === origin);
}

/**
 * Every backend succeeds unless a route overrides it. Routes added later
 * win over earlier ones.
 */
export class BackendStub {
  readonly calls: StubRequest[] = [];
  private readonly routes: Route[] = [];
  private readonly records = new Map<string, PatientRecord>();

  on(
    service: ServiceName,
    method: string,
    path: string | RegExp,
    handler: StubHandler
  ): this {
    this.routes.unshift({ service, method, path, handler });
    return this;
  }

  /**
   * Makes `GET /patients/{id}` on the store return this record.
   */
  storeRecord(record: PatientRecord): this {
    this.records.set(record.id, record);
    return this;
  }

  count(service: ServiceName, path?: string | RegExp): number {
    return this.calls.filter(
      (c) => c.service === service && (path === undefined || matches(path, c.path))
    ).length;
  }

  readonly fetchImpl: FetchLike = async (input, init) => {
    const href =
      typeof input === "string"
        ? input
        : input instanceof URL
          ? input.href
          : input.url;
    const url = new URL(href);
    const service = serviceFor(url.origin);
    if (!service) throw new TypeError(`fetch failed: unknown host ${url.host}`);

    const method = (init?.method ?? "GET").toUpperCase();
    const rawBody = init?.body;
    const body = typeof rawBody === "string" ? JSON.parse(rawBody) : null;
    const req: StubRequest = {
      service,
      method,
      path: url.pathname,
      body,
      signal: init?.signal ?? undefined,
    };
    this.calls.push(req);

    const route = this.routes.find(
      (r) => r.service === service && r.method === method && matches(r.path, req.path)
    );
    if (route) return route.handler(req);
    return this.defaultResponse(req);
  };

  private defaultResponse(req: StubRequest): Response {
    if (req.path === "/health") return json({ status: "healthy" });
    if (req.service === "ingestion" && req.path === "/ingest/patient") {
      return json({ status: "accepted" });
    }
    if (req.service === "prediction" && req.path === "/predict") {
      return json(DEFAULT_PREDICTION);
    }
    if (req.service === "patient_store") {
      const m = req.path.match(/^\/patients\/([^/]+)(\/treatments)?$/);
      if (m && m[2] && req.method === "POST") return json({ status: "updated" });
      if (m && !m[2] && req.method === "GET") {
        const record = this.records.get(decodeURIComponent(m[1]));
        if (record) {
          return json({
            id: record.id,
            genomic_data: record.genomicData,
            medical_history: record.medicalHistory,
          });
        }
      }
    }
    return json({ detail: "Not Found" }, 404);
  }
}

function matches(pattern: string | RegExp, path: string): boolean {
  return typeof pattern === "string" ? pattern === path : pattern.test(path);
}

export function testConfig(
  overrides: Partial<OrchestratorConfig> = {}
): OrchestratorConfig {
  return {
    services: { ...TEST_SERVICES },
    healthTimeoutMs: 200,
    requestTimeoutMs: 500,
    maxRetries: 3,
    backoff: { initialDelayMs: 100, maxDelayMs: 1000, factor: 2 },
    startupHealthAttempts: 3,
    healthPollIntervalMs: 0,
    logLevel: "silent",
    port: 0,
    ...overrides,
  };
}
