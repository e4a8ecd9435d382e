import { describe, expect, test } from "vitest";
import { OrchestratorMetrics } from "./metrics";

describe("OrchestratorMetrics", () => {
  test("unit results are counted by status, failures by stage and code", async () => {
    const metrics = new OrchestratorMetrics();

    metrics.recordUnit({
      status: "success",
      patientId: "A",
      recommendation: { treatment: "therapy-x", efficacy: 0.8, confidenceLevel: "high" },
      completedAt: "2024-05-01T12:00:00.000Z",
    });
    metrics.recordUnit({
      status: "failure",
      patientId: "B",
      stage: "persist",
      error: { code: "PROTOCOL_ERROR", message: "write failed", status: 500 },
    });
    metrics.recordUnit({
      status: "failure",
      patientId: "C",
      stage: "persist",
      error: { code: "PROTOCOL_ERROR", message: "write failed", status: 500 },
    });
    const text = await metrics.render();

    expect(text).toContain('orchestrator_units_total{status="success"} 1');
    expect(text).toContain('orchestrator_units_total{status="failure"} 2');
    expect(text).toContain(
      'orchestrator_unit_failures_total{stage="persist",code="PROTOCOL_ERROR"} 2'
    );
  });

  test("a call stays in flight until it is ended", async () => {
    const metrics = new OrchestratorMetrics();

    const end = metrics.startRequest("prediction");
    expect(await metrics.render()).toContain(
      'orchestrator_active_requests{service="prediction"} 1'
    );

    end("TRANSPORT_ERROR");
    const text = await metrics.render();
    expect(text).toContain('orchestrator_active_requests{service="prediction"} 0');
    expect(text).toContain(
      'orchestrator_requests_total{service="prediction",outcome="TRANSPORT_ERROR"} 1'
    );
  });

  test("instances keep separate registries", async () => {
    const a = new OrchestratorMetrics();
    const b = new OrchestratorMetrics();

    a.startRequest("ingestion")("ok");

    expect(await a.render()).toContain(
      'orchestrator_requests_total{service="ingestion",outcome="ok"} 1'
    );
    expect(await b.render()).not.toContain('service="ingestion"');
  });

  test("process metrics are collected only when asked for", async () => {
    const plain = new OrchestratorMetrics();
    const withDefaults = new OrchestratorMetrics({ defaultMetrics: true });

    expect(await plain.render()).not.toContain("orchestrator_process_cpu_seconds_total");
    expect(await withDefaults.render()).toContain(
      "orchestrator_process_cpu_seconds_total"
    );
    expect(plain.contentType.startsWith("text/plain")).toBe(true);
  });
});
