import { describe, it, expect, beforeEach } from "vitest";
import { ValidationError } from "@sitedocs/errors";
import { InMemoryVectorStore, pointId } from "@sitedocs/vector-store";
import { search, type SearchDependencies } from "./semantic-search.js";
import { FakeEmbeddingProvider } from "./testing/index.js";

const COLLECTION = "chunks";

describe("search", () => {
  let deps: SearchDependencies;
  let provider: FakeEmbeddingProvider;

  beforeEach(async () => {
    provider = new FakeEmbeddingProvider(8);
    const vectorStore = new InMemoryVectorStore();
    await vectorStore.ensureCollection(COLLECTION, 8);

    const chunks = [
      { documentId: "doc-1", chunkIndex: 0, content: "excavation and earthworks", pdfType: "cost_schedule" },
      { documentId: "doc-1", chunkIndex: 1, content: "concrete footings", pdfType: "cost_schedule" },
      { documentId: "doc-2", chunkIndex: 0, content: "site clearance programme", pdfType: "task_list" },
    ];
    await vectorStore.upsert(
      COLLECTION,
      chunks.map((c) => ({
        id: pointId(c.documentId, c.chunkIndex),
        documentId: c.documentId,
        chunkIndex: c.chunkIndex,
        vector: provider.vectorFor(c.content),
        payload: { content: c.content, pdfType: c.pdfType },
      })),
    );

    deps = {
      embeddingProvider: provider,
      vectorStore,
      collectionName: COLLECTION,
      timeouts: { embeddingMs: 1_000, vectorStoreMs: 1_000 },
    };
  });

  it("returns the closest chunk first", async () => {
    const result = await search({ query: "excavation and earthworks", topK: 1 }, deps);

    expect(result.chunks).toHaveLength(1);
    expect(result.chunks[0]).toMatchObject({
      documentId: "doc-1",
      chunkIndex: 0,
      content: "excavation and earthworks",
    });
    expect(result.chunks[0]!.score).toBeCloseTo(1);
    expect(result.metadata.tokensUsed).toBe(3);
  });

  it("returns every match when fewer than the default topK exist", async () => {
    const result = await search({ query: "concrete" }, deps);

    expect(result.chunks).toHaveLength(3);
  });

  it("narrows results with the pdfTypes filter", async () => {
    const result = await search({ query: "concrete", filter: { pdfTypes: ["task_list"] } }, deps);

    expect(result.chunks.map((c) => c.documentId)).toEqual(["doc-2"]);
  });

  it("omits the payload when metadata is not requested", async () => {
    const result = await search({ query: "concrete", topK: 1, includeMetadata: false }, deps);

    expect(result.chunks[0]!.metadata).toEqual({});
  });

  it("rejects filter fields outside the allowlist", async () => {
    const filter = { documentIds: ["doc-1"], ownerId: "t-1" };

    await expect(search({ query: "concrete", filter }, deps)).rejects.toThrow(ValidationError);
  });

  it("rejects an empty query and an out-of-range topK", async () => {
    await expect(search({ query: "   " }, deps)).rejects.toThrow("query must not be empty");
    await expect(search({ query: "concrete", topK: 0 }, deps)).rejects.toThrow(
      "topK must be an integer between 1 and 100",
    );
  });
});
