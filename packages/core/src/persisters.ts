import type { IDocumentRepository } from "@sitedocs/db";
import { AppError, ValidationError, withRetry, withTimeout } from "@sitedocs/errors";
import type { RetryOptions } from "@sitedocs/errors";
import type { Logger } from "@sitedocs/logger";
import type { EmbeddingRecord, EntityRecord, VectorRecord } from "@sitedocs/types";
import type { IVectorStore } from "@sitedocs/vector-store";
import { pointId } from "@sitedocs/vector-store";

export interface RelationalPersisterOptions {
  repository: IDocumentRepository;
  timeoutMs: number;
}

export type EntityPersistResult = "written" | "already_persisted";

/** Writes a document's entity rows in one transaction. */
export class RelationalPersister {
  constructor(private readonly options: RelationalPersisterOptions) {}

  async persist(documentId: string, entities: EntityRecord[]): Promise<EntityPersistResult> {
    try {
      await withTimeout("relational store write", this.options.timeoutMs, () =>
        this.options.repository.persistEntities(documentId, entities),
      );
      return "written";
    } catch (error: unknown) {
      // The transaction rolled back; the rows from the earlier write stand.
      if (AppError.isAppError(error) && error.kind === "PersistenceConflict") {
        return "already_persisted";
      }
      throw error;
    }
  }
}

export interface VectorPersisterOptions {
  vectorStore: IVectorStore;
  repository: IDocumentRepository;
  collectionName: string;
  dimensions: number;
  timeouts: { vectorStoreMs: number; relationalStoreMs: number };
  retry: Omit<RetryOptions, "onRetry">;
}

export function toVectorRecord(record: EmbeddingRecord): VectorRecord {
  return {
    id: pointId(record.documentId, record.chunkIndex),
    documentId: record.documentId,
    chunkIndex: record.chunkIndex,
    vector: record.vector,
    payload: { ...record.metadata, content: record.content },
  };
}

/**
 * Upserts chunk vectors by deterministic point id, so a repeated write
 * overwrites instead of duplicating, then marks the document.
 */
export class VectorPersister {
  constructor(private readonly options: VectorPersisterOptions) {}

  async persist(documentId: string, records: EmbeddingRecord[], log: Logger): Promise<void> {
    const { vectorStore, repository, collectionName, dimensions, timeouts, retry } = this.options;

    for (const record of records) {
      if (record.vector.length !== dimensions) {
        throw new ValidationError("Embedding dimension does not match the vector store", {
          vector: `chunk ${String(record.chunkIndex)} has ${String(record.vector.length)}, expected ${String(dimensions)}`,
        });
      }
    }

    const vectors = records.map(toVectorRecord);
    if (vectors.length > 0) {
      await withRetry(
        () =>
          withTimeout("vector store upsert", timeouts.vectorStoreMs, () =>
            vectorStore.upsert(collectionName, vectors),
          ),
        {
          ...retry,
          onRetry: ({ attempt, maxRetries, delayMs, error }) => {
            log.warn(
              { attempt, maxRetries, delayMs, err: error },
              "Vector upsert failed, retrying",
            );
          },
        },
      );
    }

    await withTimeout("relational store write", timeouts.relationalStoreMs, () =>
      repository.markVectorsPersisted(documentId, vectors.length),
    );
  }
}
