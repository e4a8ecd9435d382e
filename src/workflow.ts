import type { BackendGateway } from "./api";
import { toErrorDetail } from "./errors";
import { logger as rootLogger, componentLogger, type Logger } from "./logger";
import type { OrchestratorMetrics } from "./metrics";
import type {
  PatientId,
  PatientRecord,
  Stage,
  WorkflowState,
  WorkUnitResult,
} from "./types";

export type StateListener = (patientId: PatientId, state: WorkflowState) => void;

type WorkflowExecutorOptions = {
  gateway: BackendGateway;
  logger?: Logger;
  now?: () => Date;
  onStateChange?: StateListener;
  metrics?: OrchestratorMetrics;
};

/**
 * Drives one patient record through ingest -> predict -> persist, exactly
 * once per stage.
 *
 * Stages run strictly in order and the first failure ends the run, so a
 * record that failed ingestion never reaches prediction and nothing is
 * persisted for a record that was never predicted. Every error is returned
 * as a `Failure` tagged with the stage it happened in; `execute` does not
 * throw. Instances hold no per-run state and may be shared by concurrent runs.
 */
export class WorkflowExecutor {
  private readonly gateway: BackendGateway;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly onStateChange?: StateListener;
  private readonly metrics: OrchestratorMetrics | undefined;

  constructor({
    gateway,
    logger = rootLogger,
    now = () => new Date(),
    onStateChange,
    metrics,
  }: WorkflowExecutorOptions) {
    this.gateway = gateway;
    this.log = componentLogger(logger, "workflow");
    this.now = now;
    this.onStateChange = onStateChange;
    this.metrics = metrics;
  }

  async execute(
    record: PatientRecord,
    signal?: AbortSignal
  ): Promise<WorkUnitResult> {
    const result = await this.run(record, signal);
    this.metrics?.recordUnit(result);
    return result;
  }

  private async run(
    record: PatientRecord,
    signal?: AbortSignal
  ): Promise<WorkUnitResult> {
    const patientId = record.id;
    let stage: Stage = "ingest";
    this.emit(patientId, { state: "created" });

    try {
      this.emit(patientId, { state: "ingesting" });
      await this.gateway.ingestPatient(record, signal);

      stage = "predict";
      this.emit(patientId, { state: "predicting" });
      const recommendation = await this.gateway.predict(record, signal);

      stage = "persist";
      this.emit(patientId, { state: "persisting" });
      await this.gateway.attachTreatment(
        patientId,
        recommendation.treatment,
        signal
      );

      this.emit(patientId, { state: "succeeded" });
      return {
        status: "success",
        patientId,
        recommendation,
        completedAt: this.now().toISOString(),
      };
    } catch (err) {
      const error = toErrorDetail(err);
      this.emit(patientId, { state: "failed", stage });
      this.log.warn(
        { patientId, stage, code: error.code },
        `workflow failed: ${error.message}`
      );
      return { status: "failure", patientId, stage, error };
    }
  }

  private emit(patientId: PatientId, state: WorkflowState): void {
    this.log.debug({ patientId, ...state }, "workflow transition");
    if (!this.onStateChange) return;
    try {
      this.onStateChange(patientId, state);
    } catch (err) {
      this.log.error({ patientId, err }, "state listener threw");
    }
  }
}
