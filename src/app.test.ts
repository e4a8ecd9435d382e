import type { Server } from "node:http";
import { afterEach, describe, expect, test } from "vitest";
import { createApp } from "./app";
import { createLogger } from "./logger";
import { Orchestrator } from "./orchestrator";
import { BackendStub, json, testConfig } from "./testing";

const silent = createLogger({ name: "test", level: "silent" });
const servers: Server[] = [];

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(
      (s) => new Promise<void>((resolve) => s.close(() => resolve()))
    )
  );
});

async function serve(
  stub: BackendStub,
  { start = true }: { start?: boolean } = {}
): Promise<{ base: string; orchestrator: Orchestrator }> {
  const orchestrator = new Orchestrator(testConfig(), {
    fetchImpl: stub.fetchImpl,
    sleepImpl: async () => {},
    logger: silent,
    now: () => new Date("2024-05-01T12:00:00.000Z"),
  });
  if (start) await orchestrator.start();
  const app = createApp(orchestrator);

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  servers.push(server);
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  return { base: `http://127.0.0.1:${address.port}`, orchestrator };
}

function post(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("HTTP surface", () => {
  test("GET /health reports every backend", async () => {
    const { base } = await serve(new BackendStub());

    const res = await fetch(`${base}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      healthy: true,
      services: [
        { service: "ingestion", healthy: true, checked_at: "2024-05-01T12:00:00.000Z" },
        { service: "prediction", healthy: true, checked_at: "2024-05-01T12:00:00.000Z" },
        { service: "patient_store", healthy: true, checked_at: "2024-05-01T12:00:00.000Z" },
      ],
    });
  });

  test("POST /batch accepts snake_case records and returns the report", async () => {
    const stub = new BackendStub().on(
      "patient_store",
      "POST",
      "/patients/B/treatments",
      () => json({ detail: "write failed" }, 500)
    );
    const { base } = await serve(stub);

    const res = await post(`${base}/batch`, {
      patients: [
        { id: "A", genomic_data: { marker: "A" }, medical_history: {} },
        { id: "B", genomic_data: { marker: "B" }, medical_history: {} },
      ],
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      successful_count: 1,
      failed_count: 1,
      successful: [
        {
          patient_id: "A",
          recommendation: {
            recommended_treatment: "therapy-x",
            efficacy: 0.8,
            confidence_level: "high",
          },
          completed_at: "2024-05-01T12:00:00.000Z",
        },
      ],
      failed: [
        {
          patient_id: "B",
          stage: "persist",
          error: {
            code: "PROTOCOL_ERROR",
            message: 'patient_store returned HTTP 500: {"detail":"write failed"}',
            status: 500,
          },
        },
      ],
    });
  });

  test("a malformed batch is a 400", async () => {
    const { base } = await serve(new BackendStub());

    const res = await post(`${base}/batch`, { patients: [{ genomic_data: {} }] });

    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ error: expect.stringMatching(/^Invalid batch: /) });
  });

  test("POST /process answers 502 with the failing stage", async () => {
    const stub = new BackendStub().on("prediction", "POST", "/predict", () =>
      json({}, 503)
    );
    const { base } = await serve(stub);

    const res = await post(`${base}/process`, { id: "A", genomic_data: {} });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      patient_id: "A",
      stage: "predict",
      error: {
        code: "PROTOCOL_ERROR",
        message: "prediction returned HTTP 503: {}",
        status: 503,
      },
    });
  });

  test("POST /retry re-drives a failed list", async () => {
    const stub = new BackendStub().storeRecord({
      id: "A",
      genomicData: { marker: "A" },
      medicalHistory: {},
    });
    const { base } = await serve(stub);

    const res = await post(`${base}/retry`, {
      failed: [
        {
          patient_id: "A",
          stage: "ingest",
          error: { code: "TRANSPORT_ERROR", message: "ingestion unreachable" },
        },
      ],
      max_retries: 2,
    });

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      retried_count: 1,
      failed_final_count: 0,
      retried: [{ patient_id: "A", attempts_made: 1 }],
    });
  });

  test("a negative retry budget is a 400", async () => {
    const { base } = await serve(new BackendStub());
    const res = await post(`${base}/retry`, {
      failed: [{ patient_id: "A" }],
      max_retries: -1,
    });
    expect(res.status).toBe(400);
  });

  test("work is refused with 503 before the orchestrator has started", async () => {
    const stub = new BackendStub();
    const { base } = await serve(stub, { start: false });

    const res = await post(`${base}/process`, { id: "A" });

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: "Orchestrator not started: call start() before submitting work",
      code: "NOT_STARTED",
    });
    expect(stub.calls).toHaveLength(0);
  });

  test("GET /metrics exposes backend call and unit counters", async () => {
    const { base } = await serve(new BackendStub());
    await post(`${base}/process`, { id: "A", genomic_data: { marker: "A" } });

    const res = await fetch(`${base}/metrics`);
    const text = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")?.startsWith("text/plain")).toBe(true);
    expect(text).toContain('orchestrator_requests_total{service="patient_store",outcome="ok"} 1');
    expect(text).toContain('orchestrator_units_total{status="success"} 1');
  });

  test("work is refused with 503 once a backend goes down", async () => {
    let storeUp = true;
    const stub = new BackendStub().on("patient_store", "GET", "/health", () =>
      storeUp ? json({ status: "healthy" }) : json({}, 503)
    );
    const { base } = await serve(stub);

    storeUp = false;
    const health = await fetch(`${base}/health`);
    expect(health.status).toBe(503);

    const res = await post(`${base}/process`, { id: "A" });
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: "Services not healthy: patient_store",
      services: ["patient_store"],
    });
    expect(stub.count("ingestion", "/ingest/patient")).toBe(0);
  });
});
