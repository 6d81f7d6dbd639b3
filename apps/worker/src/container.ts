import type { AppConfig } from "@sitedocs/types";
import type { Logger } from "@sitedocs/logger";
import { IngestionOrchestrator } from "@sitedocs/core";
import { createDbClient, DrizzleDocumentRepository, type DbClient } from "@sitedocs/db";
import { LocalFileStorage } from "@sitedocs/storage";
import { PdfParser } from "@sitedocs/parser";
import { createEmbeddingProvider } from "@sitedocs/embeddings";
import { createVectorStore } from "@sitedocs/vector-store";

export interface Container {
  orchestrator: IngestionOrchestrator;
  db: DbClient;
}

/** Builds the orchestrator and its collaborators from validated config. */
export function createContainer(config: AppConfig, logger: Logger): Container {
  const db = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax });

  const embeddingProvider = createEmbeddingProvider({
    provider: config.embeddings.provider,
    openai: config.embeddings.openai,
    cohere: config.embeddings.cohere,
  });

  const orchestrator = new IngestionOrchestrator({
    repository: new DrizzleDocumentRepository(db.db),
    storage: new LocalFileStorage(config.storage.rootDir),
    parser: new PdfParser(),
    embeddingProvider,
    vectorStore: createVectorStore(config.vectorStore),
    collectionName: config.vectorStore.collectionName,
    chunking: config.chunking,
    retry: config.retry,
    timeouts: config.timeouts,
    logger,
  });

  return { orchestrator, db };
}
