import type { VectorStoreConfig } from "@sitedocs/types";
import { ConfigurationError } from "@sitedocs/errors";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { InMemoryVectorStore } from "./memory-adapter.js";

export type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
  VectorFilter,
} from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export { InMemoryVectorStore, cosineSimilarity } from "./memory-adapter.js";
export { pointId, POINT_ID_NAMESPACE } from "./point-id.js";

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new ConfigurationError("qdrantUrl is required for Qdrant vector store", {
          qdrantUrl: "required",
        });
      }
      return new QdrantVectorStore(config.qdrantUrl, config.qdrantApiKey);
    case "memory":
      return new InMemoryVectorStore();
    default:
      throw new ConfigurationError(`Unknown vector store type: ${String(config.type)}`);
  }
}
