import { BackoffPolicy } from "./backoff";
import type { UnitExecutor } from "./batch";
import { CancelledError, toErrorDetail } from "./errors";
import { logger as rootLogger, componentLogger, type Logger } from "./logger";
import type { RetryCandidate } from "./schemas";
import type {
  FinalFailure,
  PatientId,
  PatientRecord,
  RetriedSuccess,
  RetryLedger,
  RetryOutcome,
  WorkUnitSuccess,
} from "./types";

/**
 * Where the current state of a record is re-read from before each attempt.
 */
export interface RecordSource {
  fetchPatient(patientId: PatientId, signal?: AbortSignal): Promise<PatientRecord>;
}

type RetryCoordinatorOptions = {
  executor: UnitExecutor;
  source: RecordSource;
  backoff?: BackoffPolicy;
  logger?: Logger;
};

type UnitOutcome =
  | { kind: "retried"; value: RetriedSuccess }
  | { kind: "failedFinal"; value: FinalFailure };

/**
 * Re-drives failed units until they succeed or exhaust their budget.
 *
 * Each attempt re-fetches the record from the patient store, then runs the
 * full pipeline once. A failed re-fetch consumes the attempt like any other
 * failure. Per-unit loops run concurrently and never affect one another.
 */
export class RetryCoordinator {
  private readonly executor: UnitExecutor;
  private readonly source: RecordSource;
  private readonly backoff: BackoffPolicy;
  private readonly log: Logger;

  constructor({
    executor,
    source,
    backoff = new BackoffPolicy(),
    logger = rootLogger,
  }: RetryCoordinatorOptions) {
    this.executor = executor;
    this.source = source;
    this.backoff = backoff;
    this.log = componentLogger(logger, "retry");
  }

  async retry(
    failures: RetryCandidate[],
    maxRetries: number,
    signal?: AbortSignal
  ): Promise<RetryOutcome> {
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
    }

    const byId = new Map<PatientId, RetryCandidate>();
    for (const f of failures) if (!byId.has(f.patientId)) byId.set(f.patientId, f);

    const outcomes = await Promise.all(
      Array.from(byId.values()).map((c) => this.retryUnit(c, maxRetries, signal))
    );

    const result: RetryOutcome = { retried: [], failedFinal: [] };
    for (const o of outcomes) {
      if (o.kind === "retried") result.retried.push(o.value);
      else result.failedFinal.push(o.value);
    }

    this.log.info(
      { retried: result.retried.length, failedFinal: result.failedFinal.length },
      "retry finished"
    );
    return result;
  }

  private async retryUnit(
    candidate: RetryCandidate,
    maxRetries: number,
    signal?: AbortSignal
  ): Promise<UnitOutcome> {
    const ledger: RetryLedger = {
      patientId: candidate.patientId,
      attemptsMade: 0,
      state: "pending",
      lastStage: candidate.stage ?? "ingest",
      lastError: candidate.error ?? {
        code: "UNEXPECTED",
        message: "No error recorded for this unit",
      },
    };

    while (ledger.attemptsMade < maxRetries) {
      try {
        if (signal?.aborted) throw new CancelledError("Retry cancelled");
        if (ledger.attemptsMade > 0) {
          await this.backoff.wait(ledger.attemptsMade, signal);
        }
      } catch (err) {
        ledger.lastError = toErrorDetail(err);
        break;
      }

      ledger.attemptsMade += 1;
      const attempt = await this.attemptOnce(ledger, signal);
      if (attempt) {
        ledger.state = "succeeded";
        this.log.info(
          { patientId: ledger.patientId, attemptsMade: ledger.attemptsMade },
          "unit recovered"
        );
        return {
          kind: "retried",
          value: { ...attempt, attemptsMade: ledger.attemptsMade },
        };
      }
    }

    ledger.state = "failed_final";
    this.log.warn(
      {
        patientId: ledger.patientId,
        attemptsMade: ledger.attemptsMade,
        stage: ledger.lastStage,
        code: ledger.lastError.code,
      },
      "unit exhausted its retries"
    );
    return {
      kind: "failedFinal",
      value: {
        patientId: ledger.patientId,
        attemptsMade: ledger.attemptsMade,
        stage: ledger.lastStage,
        error: ledger.lastError,
      },
    };
  }

  /**
   * Re-fetch then execute. Updates the ledger on failure; returns the
   * success, or null.
   */
  private async attemptOnce(
    ledger: RetryLedger,
    signal?: AbortSignal
  ): Promise<WorkUnitSuccess | null> {
    let record: PatientRecord;
    try {
      record = await this.source.fetchPatient(ledger.patientId, signal);
    } catch (err) {
      ledger.lastStage = "fetch";
      ledger.lastError = toErrorDetail(err);
      return null;
    }

    try {
      const result = await this.executor.execute(record, signal);
      if (result.status === "success") return result;
      ledger.lastStage = result.stage;
      ledger.lastError = result.error;
    } catch (err) {
      ledger.lastStage = "ingest";
      ledger.lastError = toErrorDetail(err);
    }
    return null;
  }
}
