import express from "express";
import {
  NotStartedError,
  OrchestrationError,
  ServicesUnavailableError,
  ValidationError,
} from "./errors";
import type { Orchestrator } from "./orchestrator";
import {
  batchReportPayload,
  failurePayload,
  healthPayload,
  retryOutcomePayload,
  successPayload,
} from "./report";
import {
  BatchRequestSchema,
  PatientRecordSchema,
  RetryRequestSchema,
  parseOrThrow,
} from "./schemas";

function sendError(res: express.Response, err: unknown): void {
  if (err instanceof ValidationError || err instanceof RangeError) {
    res.status(400).json({ error: err.message });
    return;
  }
  if (err instanceof ServicesUnavailableError) {
    res.status(503).json({ error: err.message, services: err.services });
    return;
  }
  if (err instanceof NotStartedError) {
    res.status(503).json({ error: err.message, code: err.code });
    return;
  }
  if (err instanceof OrchestrationError) {
    res.status(500).json({ error: err.message, code: err.code });
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  res.status(500).json({ error: message });
}

/**
 * HTTP surface for the system-manager layer.
 *
 * `shutdown` aborts every unit in flight when the process is stopping.
 */
export function createApp(
  orchestrator: Orchestrator,
  opts: { shutdown?: AbortSignal } = {}
): express.Express {
  const { shutdown } = opts;
  const app = express();
  app.use(express.json({ limit: "10mb" }));

  // GET /health -> fresh probe of every backend; also refreshes admission
  app.get("/health", async (_req, res) => {
    try {
      const payload = healthPayload(await orchestrator.refreshHealth());
      res.status(payload.healthy ? 200 : 503).json(payload);
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /metrics -> Prometheus text format
  app.get("/metrics", async (_req, res) => {
    try {
      const body = await orchestrator.metrics.render();
      res.type(orchestrator.metrics.contentType).send(body);
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /process -> one record through the pipeline
  app.post("/process", async (req, res) => {
    try {
      const record = parseOrThrow(PatientRecordSchema, req.body, "patient record");
      const result = await orchestrator.processPatient(record, shutdown);
      if (result.status === "success") res.json(successPayload(result));
      else res.status(502).json(failurePayload(result));
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /batch -> concurrent run, report with per-unit attribution
  app.post("/batch", async (req, res) => {
    try {
      const records = parseOrThrow(BatchRequestSchema, req.body, "batch");
      const report = await orchestrator.runBatch(records, shutdown);
      res.json(batchReportPayload(report));
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /retry -> re-drive the failed list of an earlier report
  app.post("/retry", async (req, res) => {
    try {
      const body = parseOrThrow(RetryRequestSchema, req.body, "retry request");
      const outcome = await orchestrator.retryFailed(
        body.failed,
        body.max_retries,
        shutdown
      );
      res.json(retryOutcomePayload(outcome));
    } catch (err) {
      sendError(res, err);
    }
  });

  return app;
}
