import { describe, expect, test } from "vitest";
import {
  NotStartedError,
  ServicesUnavailableError,
  UnknownServiceError,
} from "./errors";
import { createLogger } from "./logger";
import { Orchestrator, type OrchestratorDeps } from "./orchestrator";
import { BackendStub, TEST_SERVICES, json, makeRecord, testConfig } from "./testing";
import type { HealthStatus } from "./types";

const silent = createLogger({ name: "test", level: "silent" });

function orchestratorFor(stub: BackendStub, deps: OrchestratorDeps = {}) {
  return new Orchestrator(testConfig(), {
    fetchImpl: stub.fetchImpl,
    sleepImpl: async () => {},
    logger: silent,
    now: () => new Date("2024-05-01T12:00:00.000Z"),
    ...deps,
  });
}

describe("Orchestrator", () => {
  test("construction fails when a backend address is missing", () => {
    const config = testConfig({
      services: { ...TEST_SERVICES, prediction: "  " },
    });
    expect(() => new Orchestrator(config, { logger: silent })).toThrow(
      UnknownServiceError
    );
  });

  test("work is refused until start has passed the health gate", async () => {
    const stub = new BackendStub().on("prediction", "GET", "/health", () =>
      json({}, 503)
    );
    const orchestrator = orchestratorFor(stub);

    await expect(orchestrator.runBatch([makeRecord("A")])).rejects.toBeInstanceOf(
      NotStartedError
    );
    await expect(orchestrator.processPatient(makeRecord("A"))).rejects.toBeInstanceOf(
      NotStartedError
    );
    await expect(
      orchestrator.retryFailed([{ patientId: "A" }])
    ).rejects.toBeInstanceOf(NotStartedError);
    expect(stub.calls).toHaveLength(0);
  });

  test("work is refused again after stop", async () => {
    const orchestrator = orchestratorFor(new BackendStub());
    await orchestrator.start();
    orchestrator.stop();
    await expect(orchestrator.processPatient(makeRecord("A"))).rejects.toBeInstanceOf(
      NotStartedError
    );
  });

  test("skipHealthGate admits work without start", async () => {
    const stub = new BackendStub();
    const orchestrator = orchestratorFor(stub, { skipHealthGate: true });

    const report = await orchestrator.runBatch([makeRecord("A")]);

    expect(report.successfulCount).toBe(1);
    expect(stub.count("ingestion", "/health")).toBe(0);
  });

  test("backend calls and unit results are counted", async () => {
    const stub = new BackendStub().on("prediction", "POST", "/predict", (req) =>
      typeof req.body === "object" &&
      req.body !== null &&
      "genomic_data" in req.body &&
      JSON.stringify(req.body.genomic_data).includes("bad")
        ? json({}, 500)
        : json({
            recommended_treatment: "therapy-x",
            efficacy: 0.8,
            confidence_level: "high",
          })
    );
    const orchestrator = orchestratorFor(stub);
    await orchestrator.start();

    await orchestrator.runBatch([makeRecord("A"), makeRecord("B", "bad")]);
    const text = await orchestrator.metrics.render();

    expect(text).toContain('orchestrator_requests_total{service="ingestion",outcome="ok"} 2');
    expect(text).toContain('orchestrator_requests_total{service="prediction",outcome="ok"} 1');
    expect(text).toContain(
      'orchestrator_requests_total{service="prediction",outcome="PROTOCOL_ERROR"} 1'
    );
    expect(text).toContain('orchestrator_units_total{status="success"} 1');
    expect(text).toContain(
      'orchestrator_unit_failures_total{stage="predict",code="PROTOCOL_ERROR"} 1'
    );
    orchestrator.stop();
  });

  test("start resolves once every backend is healthy", async () => {
    const stub = new BackendStub();
    const orchestrator = orchestratorFor(stub);

    const statuses = await orchestrator.start();

    expect(statuses.map((s) => [s.service, s.healthy])).toEqual([
      ["ingestion", true],
      ["prediction", true],
      ["patient_store", true],
    ]);
    expect(orchestrator.isStarted).toBe(true);
    orchestrator.stop();
  });

  test("start refuses when a backend stays down", async () => {
    const stub = new BackendStub().on("patient_store", "GET", "/health", () =>
      json({ status: "unhealthy" }, 503)
    );
    const orchestrator = orchestratorFor(stub);

    const err = await orchestrator.start().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServicesUnavailableError);
    if (err instanceof ServicesUnavailableError) {
      expect(err.services).toEqual(["patient_store"]);
      expect(err.message).toBe("Services not healthy: patient_store");
    }
    expect(orchestrator.isStarted).toBe(false);
    // three startup rounds, healthy services checked once
    expect(stub.count("patient_store", "/health")).toBe(3);
    expect(stub.count("ingestion", "/health")).toBe(1);
  });

  test("work is refused while a backend is down and admitted after recovery", async () => {
    let predictionUp = true;
    const stub = new BackendStub().on("prediction", "GET", "/health", () =>
      predictionUp ? json({ status: "healthy" }) : json({}, 503)
    );
    const changes: HealthStatus[] = [];
    const orchestrator = orchestratorFor(stub, {
      onHealthChange: (s) => changes.push(s),
    });
    await orchestrator.start();

    predictionUp = false;
    await orchestrator.refreshHealth();
    expect(orchestrator.unhealthyServices()).toEqual(["prediction"]);
    await expect(
      orchestrator.runBatch([makeRecord("A")])
    ).rejects.toBeInstanceOf(ServicesUnavailableError);
    await expect(
      orchestrator.processPatient(makeRecord("A"))
    ).rejects.toBeInstanceOf(ServicesUnavailableError);
    expect(stub.count("ingestion", "/ingest/patient")).toBe(0);

    predictionUp = true;
    await orchestrator.refreshHealth();
    const result = await orchestrator.processPatient(makeRecord("A"));
    expect(result.status).toBe("success");
    expect(changes.map((c) => [c.service, c.healthy])).toEqual([
      ["prediction", false],
      ["prediction", true],
    ]);
    orchestrator.stop();
  });

  test("a failed batch unit recovers through retryFailed", async () => {
    let ingestCalls = 0;
    const stub = new BackendStub()
      .storeRecord(makeRecord("B"))
      .on("ingestion", "POST", "/ingest/patient", (req) => {
        ingestCalls += 1;
        const isB =
          typeof req.body === "object" &&
          req.body !== null &&
          "id" in req.body &&
          req.body.id === "B";
        return isB && ingestCalls <= 2 ? json({}, 502) : json({ status: "accepted" });
      });
    const orchestrator = orchestratorFor(stub);
    await orchestrator.start();

    const report = await orchestrator.runBatch([makeRecord("A"), makeRecord("B")]);
    expect(report.successfulCount).toBe(1);
    expect(report.failed.map((f) => [f.patientId, f.stage])).toEqual([
      ["B", "ingest"],
    ]);

    const outcome = await orchestrator.retryFailed(report.failed);
    expect(outcome.failedFinal).toEqual([]);
    expect(outcome.retried.map((r) => [r.patientId, r.attemptsMade])).toEqual([
      ["B", 1],
    ]);
    orchestrator.stop();
  });

  test("health reports every backend without touching the admission gate", async () => {
    const stub = new BackendStub().on("ingestion", "GET", "/health", () =>
      json({}, 500)
    );
    const orchestrator = orchestratorFor(stub);

    const statuses = await orchestrator.health();

    expect(statuses).toEqual([
      { service: "ingestion", healthy: false, checkedAt: "2024-05-01T12:00:00.000Z" },
      { service: "prediction", healthy: true, checkedAt: "2024-05-01T12:00:00.000Z" },
      { service: "patient_store", healthy: true, checkedAt: "2024-05-01T12:00:00.000Z" },
    ]);
    expect(orchestrator.unhealthyServices()).toEqual([]);
  });
});
