import type { SearchRequest, SearchResult, ScoredChunk } from "@sitedocs/types";
import type { IEmbeddingProvider } from "@sitedocs/embeddings";
import type { IVectorStore, VectorSearchResult } from "@sitedocs/vector-store";
import { ValidationError, withTimeout } from "@sitedocs/errors";
import { validateSearchFilter } from "./filter-validator.js";

export const DEFAULT_TOP_K = 5;
const MAX_TOP_K = 100;

export interface SearchDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
  timeouts: { embeddingMs: number; vectorStoreMs: number };
}

function toScoredChunk(result: VectorSearchResult, includeMetadata: boolean): ScoredChunk {
  const documentId = result.payload["documentId"];
  const chunkIndex = result.payload["chunkIndex"];
  const content = result.payload["content"];

  return {
    documentId: typeof documentId === "string" ? documentId : "",
    chunkIndex: typeof chunkIndex === "number" ? chunkIndex : -1,
    content: typeof content === "string" ? content : "",
    score: result.score,
    metadata: includeMetadata ? result.payload : {},
  };
}

/**
 * Semantic search: Query -> Embed -> Vector Search
 *
 * Filters are checked against the allowlist before the query is embedded.
 */
export async function search(request: SearchRequest, deps: SearchDependencies): Promise<SearchResult> {
  const startTime = Date.now();

  if (request.query.trim().length === 0) {
    throw new ValidationError("query must not be empty", { query: "required" });
  }
  const topK = request.topK ?? DEFAULT_TOP_K;
  if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
    throw new ValidationError(`topK must be an integer between 1 and ${String(MAX_TOP_K)}`, {
      topK: "out of range",
    });
  }

  // Validate filters (rejects unknown fields)
  const filter = request.filter === undefined ? undefined : validateSearchFilter(request.filter);

  const embeddingResult = await withTimeout("query embedding", deps.timeouts.embeddingMs, (signal) =>
    deps.embeddingProvider.embed(request.query, { signal }),
  );
  const queryVector = embeddingResult.embeddings[0];

  if (!queryVector) {
    throw new Error("Failed to generate embedding for query");
  }

  const results = await withTimeout("vector search", deps.timeouts.vectorStoreMs, () =>
    deps.vectorStore.search(deps.collectionName, {
      vector: queryVector,
      topK,
      scoreThreshold: request.scoreThreshold,
      filter,
    }),
  );

  return {
    chunks: results.map((r) => toScoredChunk(r, request.includeMetadata ?? true)),
    metadata: {
      retrievalTimeMs: Date.now() - startTime,
      tokensUsed: embeddingResult.tokensUsed,
    },
  };
}
