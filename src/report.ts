import type {
  BatchReport,
  ErrorDetail,
  FinalFailure,
  HealthStatus,
  RetriedSuccess,
  RetryOutcome,
  RetryStage,
  Stage,
  WorkUnitFailure,
  WorkUnitSuccess,
} from "./types";

/**
 * JSON shapes handed to the CLI and HTTP callers. Keys are snake_case to
 * match the backends' wire format.
 */
export type SuccessPayload = {
  patient_id: string;
  recommendation: {
    recommended_treatment: string;
    efficacy: number;
    confidence_level: string;
  };
  completed_at: string;
};

export type FailurePayload = {
  patient_id: string;
  stage: Stage;
  error: ErrorDetail;
};

export type BatchReportPayload = {
  successful_count: number;
  failed_count: number;
  successful: SuccessPayload[];
  failed: FailurePayload[];
};

export type RetryOutcomePayload = {
  retried_count: number;
  failed_final_count: number;
  retried: (SuccessPayload & { attempts_made: number })[];
  failed_final: {
    patient_id: string;
    attempts_made: number;
    stage: RetryStage;
    error: ErrorDetail;
  }[];
};

export function successPayload(s: WorkUnitSuccess): SuccessPayload {
  return {
    patient_id: s.patientId,
    recommendation: {
      recommended_treatment: s.recommendation.treatment,
      efficacy: s.recommendation.efficacy,
      confidence_level: s.recommendation.confidenceLevel,
    },
    completed_at: s.completedAt,
  };
}

export function failurePayload(f: WorkUnitFailure): FailurePayload {
  return { patient_id: f.patientId, stage: f.stage, error: f.error };
}

export function batchReportPayload(report: BatchReport): BatchReportPayload {
  return {
    successful_count: report.successfulCount,
    failed_count: report.failedCount,
    successful: report.successful.map(successPayload),
    failed: report.failed.map(failurePayload),
  };
}

function retriedPayload(r: RetriedSuccess) {
  return { ...successPayload(r), attempts_made: r.attemptsMade };
}

function finalFailurePayload(f: FinalFailure) {
  return {
    patient_id: f.patientId,
    attempts_made: f.attemptsMade,
    stage: f.stage,
    error: f.error,
  };
}

export function retryOutcomePayload(outcome: RetryOutcome): RetryOutcomePayload {
  return {
    retried_count: outcome.retried.length,
    failed_final_count: outcome.failedFinal.length,
    retried: outcome.retried.map(retriedPayload),
    failed_final: outcome.failedFinal.map(finalFailurePayload),
  };
}

export function healthPayload(statuses: HealthStatus[]) {
  return {
    healthy: statuses.every((s) => s.healthy),
    services: statuses.map((s) => ({
      service: s.service,
      healthy: s.healthy,
      checked_at: s.checkedAt,
    })),
  };
}

/**
 * One-line human summary distinguishing total success, partial success and
 * total failure.
 */
export function summarizeBatch(report: BatchReport): string {
  const total = report.successfulCount + report.failedCount;
  if (total === 0) return "No records processed.";
  if (report.failedCount === 0) return `All ${total} records succeeded.`;
  if (report.successfulCount === 0) return `All ${total} records failed.`;
  return `${report.successfulCount}/${total} records succeeded, ${report.failedCount} failed.`;
}
