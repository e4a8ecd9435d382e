/**
 * Stable identifier for a patient, shared by every backend.
 */
export type PatientId = string;

/**
 * Logical names of the backends the orchestrator talks to.
 */
export type ServiceName = "ingestion" | "prediction" | "patient_store";

export const SERVICE_NAMES: readonly ServiceName[] = [
  "ingestion",
  "prediction",
  "patient_store",
];

/**
 * A patient record as forwarded between backends.
 *
 * `genomicData` is opaque to the orchestrator; it is never inspected or
 * mutated, only passed along.
 */
export type PatientRecord = {
  id: PatientId;
  genomicData: Record<string, unknown>;
  medicalHistory: Record<string, string[]>;
};

export type ConfidenceLevel = "high" | "medium" | "low";

/**
 * Output of the prediction backend after validation.
 */
export type Recommendation = {
  treatment: string;
  /** Always within [0, 1]. */
  efficacy: number;
  confidenceLevel: ConfidenceLevel;
};

/**
 * Pipeline phase at which a unit of work can fail.
 */
export type Stage = "ingest" | "predict" | "persist";

/**
 * Lifecycle of one WorkflowExecutor run.
 */
export type WorkflowState =
  | { state: "created" }
  | { state: "ingesting" }
  | { state: "predicting" }
  | { state: "persisting" }
  | { state: "succeeded" }
  | { state: "failed"; stage: Stage };

export type ErrorCode =
  | "TRANSPORT_ERROR"
  | "CANCELLED"
  | "PROTOCOL_ERROR"
  | "VALIDATION_ERROR"
  | "UNKNOWN_SERVICE"
  | "SERVICES_UNAVAILABLE"
  | "NOT_STARTED"
  | "CONFIG_ERROR"
  | "UNEXPECTED";

/**
 * JSON-safe description of an error captured as data.
 */
export type ErrorDetail = {
  code: ErrorCode;
  message: string;
  /** HTTP status, for protocol errors. */
  status?: number;
};

export type WorkUnitSuccess = {
  status: "success";
  patientId: PatientId;
  recommendation: Recommendation;
  completedAt: string;
};

export type WorkUnitFailure = {
  status: "failure";
  patientId: PatientId;
  stage: Stage;
  error: ErrorDetail;
};

export type WorkUnitResult = WorkUnitSuccess | WorkUnitFailure;

/**
 * Aggregate of one batch. `successful.length + failed.length` always equals
 * the number of input records.
 */
export type BatchReport = {
  successful: WorkUnitSuccess[];
  failed: WorkUnitFailure[];
  successfulCount: number;
  failedCount: number;
};

/**
 * Where a retry attempt broke: a pipeline stage, or the re-fetch of the
 * record from the patient store that precedes it.
 */
export type RetryStage = Stage | "fetch";

/**
 * Per-unit bookkeeping of the retry loop.
 *
 * `attemptsMade` never exceeds the retry budget.
 */
export type RetryLedger = {
  patientId: PatientId;
  attemptsMade: number;
  state: "pending" | "succeeded" | "failed_final";
  lastStage: RetryStage;
  lastError: ErrorDetail;
};

export type RetriedSuccess = WorkUnitSuccess & { attemptsMade: number };

export type FinalFailure = {
  patientId: PatientId;
  attemptsMade: number;
  stage: RetryStage;
  error: ErrorDetail;
};

export type RetryOutcome = {
  retried: RetriedSuccess[];
  failedFinal: FinalFailure[];
};

/**
 * Result of a single health probe. Never persisted.
 */
export type HealthStatus = {
  service: ServiceName;
  healthy: boolean;
  checkedAt: string;
};
