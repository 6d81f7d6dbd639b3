import { describe, it, expect } from "vitest";
import type { EmbeddingRecord } from "@sitedocs/types";
import { ValidationError } from "@sitedocs/errors";
import { InMemoryVectorStore, pointId } from "@sitedocs/vector-store";
import { createLogger } from "@sitedocs/logger";
import { RelationalPersister, VectorPersister, toVectorRecord } from "./persisters.js";
import { InMemoryDocumentRepository } from "./testing/index.js";

const log = createLogger({ level: "silent" });

function embedding(documentId: string, chunkIndex: number, vector: number[]): EmbeddingRecord {
  return {
    documentId,
    chunkIndex,
    vector,
    content: `chunk ${String(chunkIndex)}`,
    metadata: {
      documentId,
      chunkIndex,
      pdfType: "task_list",
      pdfName: "programme.pdf",
      pageNumber: 1,
      startChar: chunkIndex * 10,
      endChar: chunkIndex * 10 + 10,
    },
  };
}

describe("toVectorRecord", () => {
  it("keys the record by point id and carries content in the payload", () => {
    expect(toVectorRecord(embedding("doc-1", 2, [1, 0]))).toEqual({
      id: pointId("doc-1", 2),
      documentId: "doc-1",
      chunkIndex: 2,
      vector: [1, 0],
      payload: {
        documentId: "doc-1",
        chunkIndex: 2,
        pdfType: "task_list",
        pdfName: "programme.pdf",
        pageNumber: 1,
        startChar: 20,
        endChar: 30,
        content: "chunk 2",
      },
    });
  });
});

describe("RelationalPersister", () => {
  it("reports a second write as already persisted and keeps the first rows", async () => {
    const repository = new InMemoryDocumentRepository();
    const { id } = await repository.create({ pdfName: "a.pdf", storagePath: "a.pdf" });
    const persister = new RelationalPersister({ repository, timeoutMs: 1_000 });
    const step = {
      kind: "approval_step" as const,
      sequence: 0,
      stepNumber: 1,
      description: "Submit",
      authority: null,
    };

    expect(await persister.persist(id, [step])).toBe("written");
    expect(await persister.persist(id, [])).toBe("already_persisted");
    expect(await repository.listEntities(id)).toEqual([step]);
    expect((await repository.findById(id))?.entityCount).toBe(1);
  });
});

describe("VectorPersister", () => {
  async function setup() {
    const repository = new InMemoryDocumentRepository();
    const vectorStore = new InMemoryVectorStore();
    await vectorStore.ensureCollection("chunks", 2);
    const { id } = await repository.create({ pdfName: "a.pdf", storagePath: "a.pdf" });
    const persister = new VectorPersister({
      vectorStore,
      repository,
      collectionName: "chunks",
      dimensions: 2,
      timeouts: { vectorStoreMs: 1_000, relationalStoreMs: 1_000 },
      retry: { maxRetries: 0 },
    });
    return { repository, vectorStore, id, persister };
  }

  it("writes each chunk once even when persisted twice", async () => {
    const { repository, vectorStore, id, persister } = await setup();
    const records = [embedding(id, 0, [1, 0]), embedding(id, 1, [0, 1])];

    await persister.persist(id, records, log);
    await persister.persist(id, records, log);

    expect(await vectorStore.countByDocument("chunks", id)).toBe(2);
    const document = await repository.findById(id);
    expect(document?.chunkCount).toBe(2);
    expect(document?.vectorsPersistedAt).toBeInstanceOf(Date);
  });

  it("rejects vectors whose dimension differs from the provider", async () => {
    const { vectorStore, id, persister } = await setup();

    await expect(persister.persist(id, [embedding(id, 0, [1, 0, 0])], log)).rejects.toThrow(
      ValidationError,
    );
    expect(await vectorStore.countByDocument("chunks", id)).toBe(0);
  });
});
