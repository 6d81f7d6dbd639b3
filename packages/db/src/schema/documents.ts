import { pgTable, text, timestamp, jsonb, integer, pgEnum } from "drizzle-orm/pg-core";
import { ERROR_KINDS, INGESTION_STAGES, INGESTION_STATUSES, PDF_TYPES } from "@sitedocs/types";
import type { PdfType } from "@sitedocs/types";

export const pdfTypeEnum = pgEnum("pdf_type", PDF_TYPES);

export const ingestionStatusEnum = pgEnum("ingestion_status", INGESTION_STATUSES);

export const ingestionStageEnum = pgEnum("ingestion_stage", INGESTION_STAGES);

export const errorKindEnum = pgEnum("error_kind", ERROR_KINDS);

export const documents = pgTable("documents", {
  id: text("id")
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  pdfName: text("pdf_name").notNull(),
  storagePath: text("storage_path").notNull(),
  mimeType: text("mime_type").notNull().default("application/pdf"),
  pdfType: pdfTypeEnum("pdf_type").notNull().default("unknown"),
  status: ingestionStatusEnum("status").notNull().default("pending"),
  stageReached: ingestionStageEnum("stage_reached"),
  errorKind: errorKindEnum("error_kind"),
  errorCode: text("error_code"),
  errorDetail: text("error_detail"),
  extractedText: text("extracted_text"),
  pageCount: integer("page_count"),
  pageOffsets: jsonb("page_offsets").$type<number[]>(),
  classificationScores: jsonb("classification_scores").$type<Partial<Record<PdfType, number>>>(),
  entityCount: integer("entity_count").notNull().default(0),
  chunkCount: integer("chunk_count").notNull().default(0),
  entitiesPersistedAt: timestamp("entities_persisted_at", { withTimezone: true }),
  vectorsPersistedAt: timestamp("vectors_persisted_at", { withTimezone: true }),
  cancelRequestedAt: timestamp("cancel_requested_at", { withTimezone: true }),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export type DocumentRow = typeof documents.$inferSelect;
