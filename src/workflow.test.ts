import { describe, expect, test } from "vitest";
import { BackendGateway } from "./api";
import { ServiceRegistry } from "./registry";
import { BackendStub, TEST_SERVICES, hang, json, makeRecord } from "./testing";
import type { WorkflowState } from "./types";
import { WorkflowExecutor } from "./workflow";

const registry = new ServiceRegistry(TEST_SERVICES);

function executorFor(
  stub: BackendStub,
  opts: {
    timeoutMs?: number;
    onStateChange?: (id: string, s: WorkflowState) => void;
  } = {}
) {
  const gateway = new BackendGateway({
    registry,
    fetchImpl: stub.fetchImpl,
    timeoutMs: opts.timeoutMs,
  });
  return new WorkflowExecutor({
    gateway,
    now: () => new Date("2024-05-01T12:00:00.000Z"),
    onStateChange: opts.onStateChange,
  });
}

describe("WorkflowExecutor", () => {
  test("runs ingest, predict and persist once each", async () => {
    const stub = new BackendStub();
    const states: string[] = [];
    const executor = executorFor(stub, {
      onStateChange: (_id, s) => states.push(s.state),
    });

    const result = await executor.execute(makeRecord("A"));

    expect(result).toEqual({
      status: "success",
      patientId: "A",
      recommendation: {
        treatment: "therapy-x",
        efficacy: 0.8,
        confidenceLevel: "high",
      },
      completedAt: "2024-05-01T12:00:00.000Z",
    });
    expect(stub.calls.map((c) => `${c.service} ${c.method} ${c.path}`)).toEqual([
      "ingestion POST /ingest/patient",
      "prediction POST /predict",
      "patient_store POST /patients/A/treatments",
    ]);
    expect(stub.calls[2].body).toEqual({ treatment: "therapy-x" });
    expect(states).toEqual([
      "created",
      "ingesting",
      "predicting",
      "persisting",
      "succeeded",
    ]);
  });

  test("ingest failure short-circuits the pipeline", async () => {
    const stub = new BackendStub().on("ingestion", "POST", "/ingest/patient", () =>
      json({ detail: "boom" }, 500)
    );
    const result = await executorFor(stub).execute(makeRecord("A"));

    expect(result).toEqual({
      status: "failure",
      patientId: "A",
      stage: "ingest",
      error: {
        code: "PROTOCOL_ERROR",
        message: 'ingestion returned HTTP 500: {"detail":"boom"}',
        status: 500,
      },
    });
    expect(stub.count("ingestion")).toBe(1);
    expect(stub.count("prediction")).toBe(0);
    expect(stub.count("patient_store")).toBe(0);
  });

  test("predict failure leaves one ingest call and no persist call", async () => {
    const stub = new BackendStub().on("prediction", "POST", "/predict", () => {
      throw new TypeError("fetch failed");
    });
    const result = await executorFor(stub).execute(makeRecord("A"));

    expect(result.status).toBe("failure");
    if (result.status === "failure") {
      expect(result.stage).toBe("predict");
      expect(result.error.code).toBe("TRANSPORT_ERROR");
    }
    expect(stub.count("ingestion")).toBe(1);
    expect(stub.count("prediction")).toBe(1);
    expect(stub.count("patient_store")).toBe(0);
  });

  test("a malformed prediction fails at predict like a transport error", async () => {
    const stub = new BackendStub().on("prediction", "POST", "/predict", () =>
      json({ recommended_treatment: "therapy-x", efficacy: 0.5 })
    );
    const result = await executorFor(stub).execute(makeRecord("A"));

    expect(result).toMatchObject({
      status: "failure",
      stage: "predict",
      error: { code: "VALIDATION_ERROR" },
    });
    expect(stub.count("patient_store")).toBe(0);
  });

  test("a prediction timeout fails at predict", async () => {
    const stub = new BackendStub().on("prediction", "POST", "/predict", (req) =>
      hang(req.signal)
    );
    const result = await executorFor(stub, { timeoutMs: 20 }).execute(
      makeRecord("A")
    );

    expect(result).toEqual({
      status: "failure",
      patientId: "A",
      stage: "predict",
      error: {
        code: "TRANSPORT_ERROR",
        message: "prediction did not respond within 20ms",
      },
    });
  });

  test("persist failure is distinguishable from never predicted", async () => {
    const stub = new BackendStub().on(
      "patient_store",
      "POST",
      "/patients/A/treatments",
      () => json({ detail: "write failed" }, 500)
    );
    const states: WorkflowState[] = [];
    const result = await executorFor(stub, {
      onStateChange: (_id, s) => states.push(s),
    }).execute(makeRecord("A"));

    expect(result).toMatchObject({
      status: "failure",
      stage: "persist",
      error: { code: "PROTOCOL_ERROR", status: 500 },
    });
    expect(states[states.length - 1]).toEqual({ state: "failed", stage: "persist" });
    expect(stub.count("ingestion")).toBe(1);
    expect(stub.count("prediction")).toBe(1);
  });

  test("an aborted run is reported as cancelled at its current stage", async () => {
    const controller = new AbortController();
    controller.abort();
    const stub = new BackendStub();
    const result = await executorFor(stub).execute(
      makeRecord("A"),
      controller.signal
    );

    expect(result).toMatchObject({
      status: "failure",
      stage: "ingest",
      error: { code: "CANCELLED" },
    });
    expect(stub.calls).toHaveLength(0);
  });

  test("a throwing state listener does not change the outcome", async () => {
    const stub = new BackendStub();
    const executor = executorFor(stub, {
      onStateChange: () => {
        throw new Error("listener bug");
      },
    });
    const result = await executor.execute(makeRecord("A"));
    expect(result.status).toBe("success");
  });

  test("one executor serves concurrent runs independently", async () => {
    const stub = new BackendStub().on("prediction", "POST", "/predict", (req) => {
      const body = req.body;
      const marker =
        typeof body === "object" && body !== null && "genomic_data" in body
          ? JSON.stringify(body.genomic_data)
          : "";
      return marker.includes("bad")
        ? json({}, 500)
        : json({
            recommended_treatment: "therapy-x",
            efficacy: 0.9,
            confidence_level: "medium",
          });
    });
    const executor = executorFor(stub);

    const [a, b] = await Promise.all([
      executor.execute(makeRecord("A")),
      executor.execute(makeRecord("B", "bad")),
    ]);

    expect(a.status).toBe("success");
    expect(b).toMatchObject({ status: "failure", patientId: "B", stage: "predict" });
  });
});
