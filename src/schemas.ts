import { z } from "zod";
import { ValidationError } from "./errors";
import type {
  ErrorDetail,
  PatientRecord,
  Recommendation,
  RetryStage,
} from "./types";

const MedicalHistorySchema = z.record(z.array(z.string()));
const GenomicDataSchema = z.record(z.unknown());

/**
 * Patient record as it travels on the wire.
 *
 * Backends speak snake_case; camelCase aliases are tolerated on input so that
 * hand-written batch files work either way.
 */
export const PatientRecordSchema = z
  .object({
    id: z
      .union([z.string(), z.number()])
      .transform((v) => String(v).trim())
      .pipe(z.string().min(1, "id must not be empty")),
    genomic_data: GenomicDataSchema.optional(),
    genomicData: GenomicDataSchema.optional(),
    medical_history: MedicalHistorySchema.optional(),
    medicalHistory: MedicalHistorySchema.optional(),
  })
  .transform(
    (r): PatientRecord => ({
      id: r.id,
      genomicData: r.genomic_data ?? r.genomicData ?? {},
      medicalHistory: r.medical_history ?? r.medicalHistory ?? {},
    })
  );

export const PredictionResponseSchema = z
  .object({
    recommended_treatment: z.string().trim().min(1),
    efficacy: z.number().min(0).max(1),
    confidence_level: z.enum(["high", "medium", "low"]),
  })
  .transform(
    (p): Recommendation => ({
      treatment: p.recommended_treatment,
      efficacy: p.efficacy,
      confidenceLevel: p.confidence_level,
    })
  );

export const BatchRequestSchema = z
  .union([
    z.array(PatientRecordSchema),
    z.object({ patients: z.array(PatientRecordSchema) }),
  ])
  .transform((v) => (Array.isArray(v) ? v : v.patients));

const StageSchema = z.enum(["ingest", "predict", "persist", "fetch"]);

const ErrorDetailSchema = z.object({
  code: z.string(),
  message: z.string(),
  status: z.number().optional(),
});

/**
 * One entry of a `failed` list, as found in a batch report payload.
 */
export const RetryCandidateSchema = z
  .object({
    patient_id: z.string().trim().min(1).optional(),
    patientId: z.string().trim().min(1).optional(),
    stage: StageSchema.optional(),
    error: ErrorDetailSchema.optional(),
  })
  .refine((c) => c.patient_id !== undefined || c.patientId !== undefined, {
    message: "patient_id is required",
  })
  .transform((c): RetryCandidate => {
    const candidate: RetryCandidate = {
      patientId: c.patient_id ?? c.patientId ?? "",
    };
    if (c.stage) candidate.stage = c.stage;
    if (c.error) {
      candidate.error = {
        code: asErrorCode(c.error.code),
        message: c.error.message,
        ...(c.error.status !== undefined ? { status: c.error.status } : {}),
      };
    }
    return candidate;
  });

export const RetryRequestSchema = z.object({
  failed: z.array(RetryCandidateSchema),
  max_retries: z.number().int().min(0).optional(),
});

const SettledUnitSchema = z.object({ patient_id: z.string().trim().min(1) });

/**
 * The `retry` section of a report: units that already recovered or were
 * given up on. Neither is retried again.
 */
export const RetrySectionSchema = z.object({
  retried: z.array(SettledUnitSchema).default([]),
  failed_final: z.array(SettledUnitSchema).default([]),
});

/**
 * A unit handed to the retry coordinator. A batch failure satisfies this
 * shape as-is.
 */
export type RetryCandidate = {
  patientId: string;
  stage?: RetryStage;
  error?: ErrorDetail;
};

const ERROR_CODES: readonly ErrorDetail["code"][] = [
  "TRANSPORT_ERROR",
  "CANCELLED",
  "PROTOCOL_ERROR",
  "VALIDATION_ERROR",
  "UNKNOWN_SERVICE",
  "SERVICES_UNAVAILABLE",
  "NOT_STARTED",
  "CONFIG_ERROR",
  "UNEXPECTED",
];

function asErrorCode(code: string): ErrorDetail["code"] {
  return ERROR_CODES.find((c) => c === code) ?? "UNEXPECTED";
}

const HEALTHY_SIGNALS = new Set(["healthy", "ok", "up", "pass"]);

const HealthBodySchema = z.object({
  status: z.string().optional(),
  healthy: z.boolean().optional(),
});

/**
 * Healthy-body convention shared with the backends.
 *
 * - empty body: the status code alone is the signal
 * - text body: must be one of the healthy words
 * - JSON object: `status`, when present, must be a healthy word and
 *   `healthy`, when present, must be true
 */
export function isHealthyBody(body: unknown): boolean {
  if (body === null) return true;
  if (typeof body === "string") {
    return HEALTHY_SIGNALS.has(body.trim().toLowerCase());
  }
  if (typeof body !== "object" || Array.isArray(body)) return false;

  const parsed = HealthBodySchema.safeParse(body);
  if (!parsed.success) return false;
  const { status, healthy } = parsed.data;
  if (status !== undefined && !HEALTHY_SIGNALS.has(status.toLowerCase())) {
    return false;
  }
  return healthy !== false;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) =>
    i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
  );
}

/**
 * Parses `value` with `schema`, raising ValidationError with readable issue
 * paths on failure.
 */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string
): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const issues = formatIssues(result.error);
  throw new ValidationError(`Invalid ${what}: ${issues.join("; ")}`, issues);
}
