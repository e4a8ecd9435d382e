/**
 * HTTP clients for the ingestion, prediction and patient-store backends.
 *
 * Every call is a single attempt bounded by a timeout; retry policy belongs
 * to the callers. Requires Node 18+ (global fetch, whose pool is safe to share
 * across concurrent units).
 */
import {
  CancelledError,
  ProtocolError,
  TransportError,
  ValidationError,
  toErrorDetail,
} from "./errors";
import type { OrchestratorMetrics } from "./metrics";
import type { ServiceRegistry } from "./registry";
import {
  PatientRecordSchema,
  PredictionResponseSchema,
  parseOrThrow,
} from "./schemas";
import type {
  PatientId,
  PatientRecord,
  Recommendation,
  ServiceName,
} from "./types";

export type FetchLike = (
  input: string | URL | Request,
  init?: RequestInit
) => Promise<Response>;

export type RequestOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

type ServiceClientOptions = {
  service: ServiceName;
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  metrics?: OrchestratorMetrics;
};

async function readJsonResponse(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeBody(body: unknown): string {
  const msg = typeof body === "string" ? body : JSON.stringify(body);
  return msg.length > 200 ? `${msg.slice(0, 200)}...` : msg;
}

export class ServiceClient {
  readonly service: ServiceName;
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly metrics: OrchestratorMetrics | undefined;

  constructor({
    service,
    baseUrl,
    timeoutMs = 10000,
    fetchImpl = fetch,
    metrics,
  }: ServiceClientOptions) {
    this.service = service;
    this.baseUrl = String(baseUrl || "").replace(/\/$/, "");
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl;
    this.metrics = metrics;
  }

  /**
   * Issues one request and decodes the body.
   *
   * @throws CancelledError when `opts.signal` aborts.
   * @throws TransportError on connection failure or timeout.
   * @throws ProtocolError on any non-2xx status.
   */
  async requestJson(
    path: string,
    init: RequestInit = {},
    opts: RequestOptions = {}
  ): Promise<{ status: number; body: unknown }> {
    const done = this.metrics?.startRequest(this.service);
    try {
      const result = await this.send(path, init, opts);
      done?.("ok");
      return result;
    } catch (err) {
      done?.(toErrorDetail(err).code);
      throw err;
    }
  }

  private async send(
    path: string,
    init: RequestInit,
    opts: RequestOptions
  ): Promise<{ status: number; body: unknown }> {
    const url = `${this.baseUrl}${path}`;
    const timeoutMs = opts.timeoutMs ?? this.timeoutMs;
    const { signal } = opts;

    if (signal?.aborted) {
      throw new CancelledError(`${this.service} call cancelled`, { url });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    // AbortSignal.any holds no listener on the caller's signal, which is
    // shared by every call of a batch.
    const linked = signal
      ? AbortSignal.any([signal, controller.signal])
      : controller.signal;

    const headers = new Headers(init.headers);
    headers.set("accept", "application/json");

    let res: Response;
    let body: unknown;
    try {
      res = await this.fetchImpl(url, {
        ...init,
        signal: linked,
        headers,
      });
      body = await readJsonResponse(res);
    } catch (err) {
      if (signal?.aborted) {
        throw new CancelledError(`${this.service} call cancelled`, { url });
      }
      if (timedOut) {
        throw new TransportError(
          `${this.service} did not respond within ${timeoutMs}ms`,
          { url, timeoutMs }
        );
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${this.service} unreachable: ${reason}`, {
        url,
      });
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      throw new ProtocolError(
        res.status,
        `${this.service} returned HTTP ${res.status}: ${describeBody(body)}`,
        { url }
      );
    }
    return { status: res.status, body };
  }

  async postJson(
    path: string,
    payload: unknown,
    opts: RequestOptions = {}
  ): Promise<unknown> {
    const { body } = await this.requestJson(
      path,
      {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
      },
      opts
    );
    return body;
  }

  async getJson(path: string, opts: RequestOptions = {}): Promise<unknown> {
    const { body } = await this.requestJson(path, { method: "GET" }, opts);
    return body;
  }
}

/**
 * Record shape the backends expect.
 */
export type WirePatientRecord = {
  id: PatientId;
  genomic_data: Record<string, unknown>;
  medical_history: Record<string, string[]>;
};

export function toWireRecord(record: PatientRecord): WirePatientRecord {
  return {
    id: record.id,
    genomic_data: record.genomicData,
    medical_history: record.medicalHistory,
  };
}

export type BackendGatewayOptions = {
  registry: ServiceRegistry;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  metrics?: OrchestratorMetrics;
};

/**
 * Typed access to the three pipeline backends.
 *
 * Addresses are resolved once, here; an unregistered backend fails
 * construction with UnknownServiceError.
 */
export class BackendGateway {
  private readonly ingestion: ServiceClient;
  private readonly prediction: ServiceClient;
  private readonly store: ServiceClient;

  constructor({ registry, timeoutMs, fetchImpl, metrics }: BackendGatewayOptions) {
    const client = (service: ServiceName) =>
      new ServiceClient({
        service,
        baseUrl: registry.resolve(service),
        timeoutMs,
        fetchImpl,
        metrics,
      });
    this.ingestion = client("ingestion");
    this.prediction = client("prediction");
    this.store = client("patient_store");
  }

  async ingestPatient(
    record: PatientRecord,
    signal?: AbortSignal
  ): Promise<void> {
    await this.ingestion.postJson("/ingest/patient", toWireRecord(record), {
      signal,
    });
  }

  async predict(
    record: PatientRecord,
    signal?: AbortSignal
  ): Promise<Recommendation> {
    const body = await this.prediction.postJson(
      "/predict",
      {
        genomic_data: record.genomicData,
        medical_history: record.medicalHistory,
      },
      { signal }
    );
    return parseOrThrow(PredictionResponseSchema, body, "prediction response");
  }

  async attachTreatment(
    patientId: PatientId,
    treatment: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.store.postJson(
      `/patients/${encodeURIComponent(patientId)}/treatments`,
      { treatment },
      { signal }
    );
  }

  async fetchPatient(
    patientId: PatientId,
    signal?: AbortSignal
  ): Promise<PatientRecord> {
    const body = await this.store.getJson(
      `/patients/${encodeURIComponent(patientId)}`,
      { signal }
    );
    const record = parseOrThrow(PatientRecordSchema, body, "patient record");
    if (record.id !== patientId) {
      throw new ValidationError(
        `patient_store returned record ${record.id} for ${patientId}`,
        ["id: does not match requested patient"]
      );
    }
    return record;
  }
}
