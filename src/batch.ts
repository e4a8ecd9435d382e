import { toErrorDetail } from "./errors";
import { logger as rootLogger, componentLogger, type Logger } from "./logger";
import type {
  BatchReport,
  PatientRecord,
  WorkUnitFailure,
  WorkUnitResult,
  WorkUnitSuccess,
} from "./types";

/**
 * Anything that can drive a single unit of work. WorkflowExecutor is the
 * production implementation.
 */
export interface UnitExecutor {
  execute(record: PatientRecord, signal?: AbortSignal): Promise<WorkUnitResult>;
}

/**
 * Splits unit results into the two report lists, preserving input order.
 */
export function buildBatchReport(results: WorkUnitResult[]): BatchReport {
  const successful: WorkUnitSuccess[] = [];
  const failed: WorkUnitFailure[] = [];

  for (const r of results) {
    if (r.status === "success") successful.push(r);
    else failed.push(r);
  }

  return {
    successful,
    failed,
    successfulCount: successful.length,
    failedCount: failed.length,
  };
}

type BatchCoordinatorOptions = {
  executor: UnitExecutor;
  /** Cap on units in flight; unbounded when omitted. */
  concurrency?: number;
  logger?: Logger;
};

/**
 * Runs many units of work concurrently and aggregates their results.
 *
 * Units are isolated from one another: a unit that fails, or whose executor
 * throws outright, only contributes its own `Failure` to the report. Results
 * are correlated to inputs by position, never by completion order.
 */
export class BatchCoordinator {
  private readonly executor: UnitExecutor;
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor({ executor, concurrency, logger = rootLogger }: BatchCoordinatorOptions) {
    this.executor = executor;
    this.concurrency =
      concurrency !== undefined && Number.isFinite(concurrency) && concurrency >= 1
        ? Math.floor(concurrency)
        : Infinity;
    this.log = componentLogger(logger, "batch");
  }

  async runBatch(
    records: PatientRecord[],
    signal?: AbortSignal
  ): Promise<BatchReport> {
    const results = new Array<WorkUnitResult>(records.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < records.length) {
        const index = next;
        next += 1;
        results[index] = await this.runUnit(records[index], signal);
      }
    };

    const width = Math.min(this.concurrency, records.length);
    this.log.info(
      { units: records.length, concurrency: width },
      "batch started"
    );
    await Promise.all(Array.from({ length: width }, () => worker()));

    const report = buildBatchReport(results);
    if (report.successfulCount + report.failedCount !== records.length) {
      throw new Error(
        `Batch accounting mismatch: ${report.successfulCount} + ${report.failedCount} != ${records.length}`
      );
    }

    this.log.info(
      { successful: report.successfulCount, failed: report.failedCount },
      "batch finished"
    );
    return report;
  }

  private async runUnit(
    record: PatientRecord,
    signal?: AbortSignal
  ): Promise<WorkUnitResult> {
    try {
      return await this.executor.execute(record, signal);
    } catch (err) {
      this.log.error({ patientId: record.id, err }, "executor threw");
      return {
        status: "failure",
        patientId: record.id,
        stage: "ingest",
        error: toErrorDetail(err),
      };
    }
  }
}
