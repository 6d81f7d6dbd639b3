import { INGESTION_STAGES, INGESTION_STATUS_SEQUENCE } from "@sitedocs/types";
import type { Document, IngestionStage, IngestionStatus } from "@sitedocs/types";
import { ValidationError } from "@sitedocs/errors";

export const STATUS_FOR_STAGE: Readonly<Record<IngestionStage, IngestionStatus>> = {
  extract_text: "extracting",
  classify: "classifying",
  extract_entities: "extracting_entities",
  chunk: "embedding",
  embed: "embedding",
  persist_entities: "persisting",
  persist_vectors: "persisting",
};

function position(status: IngestionStatus): number {
  return status === "failed" ? -1 : INGESTION_STATUS_SEQUENCE.indexOf(status);
}

export function isTerminal(status: IngestionStatus): boolean {
  return status === "complete" || status === "failed";
}

/**
 * Forward moves (or staying put) along the status sequence, and `failed`
 * from any non-terminal status. Leaving `failed` is not a transition; only
 * reconciliation reopens a document.
 */
export function canTransition(from: IngestionStatus, to: IngestionStatus): boolean {
  if (isTerminal(from)) return false;
  if (to === "failed") return true;
  return position(to) >= position(from);
}

/**
 * Status to hold while `stage` runs. A document resumed past that stage's
 * status keeps the later one.
 */
export function statusForStage(stage: IngestionStage, current: IngestionStatus): IngestionStatus {
  const target = STATUS_FOR_STAGE[stage];
  return position(target) < position(current) ? current : target;
}

export function assertTransition(from: IngestionStatus, to: IngestionStatus): void {
  if (!canTransition(from, to)) {
    throw new ValidationError(`Illegal status transition ${from} -> ${to}`, {
      status: `${from} -> ${to}`,
    });
  }
}

/**
 * First stage whose output is missing from the document row, or null when
 * both persistence markers are set.
 */
export function firstMissingStage(document: Document): IngestionStage | null {
  if (document.extractedText === null) return "extract_text";
  if (document.classificationScores === null) return "classify";
  if (document.entitiesPersistedAt === null) return "extract_entities";
  if (document.vectorsPersistedAt === null) return "chunk";
  return null;
}

/**
 * Stages to run from `start` onward, skipping those whose results are
 * already persisted on the document.
 */
export function stagesFrom(start: IngestionStage, document: Document): IngestionStage[] {
  const entitiesDone = document.entitiesPersistedAt !== null;
  const vectorsDone = document.vectorsPersistedAt !== null;

  return INGESTION_STAGES.slice(INGESTION_STAGES.indexOf(start)).filter((stage) => {
    if (entitiesDone && (stage === "extract_entities" || stage === "persist_entities")) {
      return false;
    }
    if (vectorsDone && (stage === "chunk" || stage === "embed" || stage === "persist_vectors")) {
      return false;
    }
    return true;
  });
}
