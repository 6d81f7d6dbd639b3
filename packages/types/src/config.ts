import type { ChunkingConfig } from "./pipeline.js";

export type EmbeddingProviderType = "openai" | "cohere";

export type VectorStoreType = "qdrant" | "memory";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  storage: StorageConfig;
  vectorStore: VectorStoreConfig;
  embeddings: EmbeddingsConfig;
  chunking: ChunkingConfig;
  retry: RetryConfig;
  timeouts: TimeoutConfig;
  worker: WorkerConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface StorageConfig {
  rootDir: string;
}

export interface VectorStoreConfig {
  type: VectorStoreType;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  collectionName: string;
}

export interface EmbeddingsConfig {
  provider: EmbeddingProviderType;
  openai: {
    apiKey: string;
    model: string;
  };
  cohere: {
    apiKey: string;
    model: string;
  };
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Upper bounds, in milliseconds, for every call that leaves the process. */
export interface TimeoutConfig {
  storageMs: number;
  textExtractionMs: number;
  embeddingMs: number;
  relationalStoreMs: number;
  vectorStoreMs: number;
}

export interface WorkerConfig {
  concurrency: number;
}
