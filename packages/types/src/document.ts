export const PDF_TYPES = [
  "unknown",
  "ura_circular",
  "cost_schedule",
  "task_list",
  "approval_process",
] as const;

export type PdfType = (typeof PDF_TYPES)[number];

/**
 * Ingestion status, in the order a document moves through it.
 * `failed` is terminal and sits outside the forward sequence.
 */
export const INGESTION_STATUS_SEQUENCE = [
  "pending",
  "extracting",
  "classifying",
  "extracting_entities",
  "embedding",
  "persisting",
  "complete",
] as const;

export type IngestionStatus = (typeof INGESTION_STATUS_SEQUENCE)[number] | "failed";

export type TerminalStatus = "complete" | "failed";

export const INGESTION_STAGES = [
  "extract_text",
  "classify",
  "extract_entities",
  "chunk",
  "embed",
  "persist_entities",
  "persist_vectors",
] as const;

export type IngestionStage = (typeof INGESTION_STAGES)[number];

export const INGESTION_STATUSES = [...INGESTION_STATUS_SEQUENCE, "failed"] as const;

export const ERROR_KINDS = [
  "ConfigurationError",
  "TransientExternalError",
  "UnparseableInput",
  "PersistenceConflict",
  "NotFound",
  "Validation",
  "Cancelled",
  "Internal",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export interface Document {
  id: string;
  pdfName: string;
  storagePath: string;
  mimeType: string;
  pdfType: PdfType;
  status: IngestionStatus;
  stageReached: IngestionStage | null;
  errorKind: ErrorKind | null;
  errorCode: string | null;
  errorDetail: string | null;
  extractedText: string | null;
  pageCount: number | null;
  /** Offset in `extractedText` where each page starts, in page order. */
  pageOffsets: number[] | null;
  classificationScores: Partial<Record<PdfType, number>> | null;
  entityCount: number;
  chunkCount: number;
  entitiesPersistedAt: Date | null;
  vectorsPersistedAt: Date | null;
  cancelRequestedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewDocument {
  pdfName: string;
  storagePath: string;
  mimeType?: string;
}

/** Fields the orchestrator may change on a status transition. */
export type DocumentPatch = Partial<
  Pick<
    Document,
    | "pdfType"
    | "status"
    | "stageReached"
    | "errorKind"
    | "errorCode"
    | "errorDetail"
    | "extractedText"
    | "pageCount"
    | "pageOffsets"
    | "classificationScores"
    | "entityCount"
    | "chunkCount"
    | "entitiesPersistedAt"
    | "vectorsPersistedAt"
  >
>;

export interface StageError {
  /**
   * Stage the failure belongs to. A cancelled run reports the last stage
   * that ran, or `extract_text` when none did, matching `stageReached`.
   */
  stage: IngestionStage;
  kind: ErrorKind;
  code: string;
  message: string;
}

export interface IngestionOutcome {
  documentId: string;
  status: TerminalStatus;
  stageReached: IngestionStage | null;
  error?: StageError;
  entityCount: number;
  chunkCount: number;
}
