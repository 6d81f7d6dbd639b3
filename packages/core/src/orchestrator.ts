import type {
  ChunkResult,
  ChunkingConfig,
  Document,
  DocumentPatch,
  EmbeddingRecord,
  EntityRecord,
  IngestionOutcome,
  IngestionStage,
  PdfType,
  RetryConfig,
  StageError,
  TimeoutConfig,
} from "@sitedocs/types";
import type { IDocumentRepository } from "@sitedocs/db";
import type { IFileStorage } from "@sitedocs/storage";
import { pageNumberAt, type IParser } from "@sitedocs/parser";
import type { IEmbeddingProvider } from "@sitedocs/embeddings";
import type { IVectorStore } from "@sitedocs/vector-store";
import type { ExtractorRegistry } from "@sitedocs/extractors";
import { createExtractorRegistry } from "@sitedocs/extractors";
import { scoreDocument, type ClassificationResult } from "@sitedocs/classifier";
import { chunkText, validateChunkingConfig } from "@sitedocs/chunker";
import {
  AppError,
  IngestionCancelledError,
  NotFoundError,
  errorKindOf,
  errorMessageOf,
  withRetry,
  withTimeout,
  type RetryOptions,
} from "@sitedocs/errors";
import { createChildLogger, scrubSecrets, type Logger } from "@sitedocs/logger";
import { RelationalPersister, VectorPersister } from "./persisters.js";
import {
  STATUS_FOR_STAGE,
  assertTransition,
  firstMissingStage,
  isTerminal,
  stagesFrom,
  statusForStage,
} from "./state-machine.js";

export interface OrchestratorDependencies {
  repository: IDocumentRepository;
  storage: IFileStorage;
  parser: IParser;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
  chunking: ChunkingConfig;
  retry: RetryConfig;
  timeouts: TimeoutConfig;
  logger: Logger;
  extractors?: ExtractorRegistry;
  classifier?: (text: string) => ClassificationResult;
}

/** Per-run values handed from one stage to the next. */
interface RunContext {
  document: Document;
  log: Logger;
  stageReached: IngestionStage | null;
  entities?: EntityRecord[];
  chunks?: ChunkResult[];
  records?: EmbeddingRecord[];
}

const CLEARED_ERROR = {
  errorKind: null,
  errorCode: null,
  errorDetail: null,
} as const satisfies DocumentPatch;

class StageFailure extends Error {
  constructor(
    readonly stage: IngestionStage,
    readonly original: unknown,
  ) {
    super(errorMessageOf(original));
  }
}

/**
 * Drives one document through extract_text -> classify -> extract_entities
 * -> chunk -> embed -> persist_entities -> persist_vectors.
 *
 * All progress lives on the document row: status and `stageReached` are
 * written before a stage runs and its outputs after, so `reconcile` can
 * resume from the first stage whose output is missing. Runs for different
 * documents share no state.
 */
export class IngestionOrchestrator {
  private readonly extractors: ExtractorRegistry;
  private readonly classifier: (text: string) => ClassificationResult;
  private readonly retryOptions: Omit<RetryOptions, "onRetry">;
  private readonly relationalPersister: RelationalPersister;
  private readonly vectorPersister: VectorPersister;

  constructor(private readonly deps: OrchestratorDependencies) {
    validateChunkingConfig(deps.chunking);

    this.extractors = deps.extractors ?? createExtractorRegistry();
    this.classifier = deps.classifier ?? scoreDocument;
    this.retryOptions = {
      maxRetries: Math.max(0, deps.retry.maxAttempts - 1),
      baseDelayMs: deps.retry.baseDelayMs,
      maxDelayMs: deps.retry.maxDelayMs,
    };
    this.relationalPersister = new RelationalPersister({
      repository: deps.repository,
      timeoutMs: deps.timeouts.relationalStoreMs,
    });
    this.vectorPersister = new VectorPersister({
      vectorStore: deps.vectorStore,
      repository: deps.repository,
      collectionName: deps.collectionName,
      dimensions: deps.embeddingProvider.dimensions,
      timeouts: deps.timeouts,
      retry: this.retryOptions,
    });
  }

  /**
   * Prepares the vector collection for the provider's dimension. Fails with
   * ConfigurationError when an existing collection has another vector size.
   */
  async initialize(): Promise<void> {
    await withTimeout("vector store setup", this.deps.timeouts.vectorStoreMs, () =>
      this.deps.vectorStore.ensureCollection(
        this.deps.collectionName,
        this.deps.embeddingProvider.dimensions,
      ),
    );
    this.deps.logger.info(
      {
        collectionName: this.deps.collectionName,
        provider: this.deps.embeddingProvider.name,
        dimensions: this.deps.embeddingProvider.dimensions,
      },
      "Vector collection ready",
    );
  }

  /**
   * Runs every stage for a pending document. A document that already left
   * `pending` is resumed from its first missing stage; a terminal one is
   * reported as it stands.
   */
  async startIngestion(documentId: string): Promise<IngestionOutcome> {
    const document = await this.load(documentId);
    const log = createChildLogger(this.deps.logger, { documentId });

    if (isTerminal(document.status)) {
      log.info({ status: document.status }, "Document already terminal, nothing to do");
      return this.outcomeOf(document);
    }

    if (document.status !== "pending") {
      log.warn({ status: document.status }, "Document was interrupted, resuming");
      return this.resume(document, log);
    }

    return this.run(
      { document, log, stageReached: document.stageReached },
      stagesFrom("extract_text", document),
    );
  }

  /**
   * Re-runs only the stages whose output is missing, reusing persisted text
   * and type. Entities are not re-extracted once persisted. This is the one
   * way out of `failed`.
   */
  async reconcile(documentId: string): Promise<IngestionOutcome> {
    const document = await this.load(documentId);
    const log = createChildLogger(this.deps.logger, { documentId, reconcile: true });
    return this.resume(document, log);
  }

  /** Flags the document; the run stops before its next stage starts. */
  async requestCancellation(documentId: string): Promise<void> {
    const document = await this.deps.repository.requestCancellation(documentId);
    this.deps.logger.info(
      { documentId, status: document.status },
      "Cancellation requested for document",
    );
  }

  private async resume(document: Document, log: Logger): Promise<IngestionOutcome> {
    const start = firstMissingStage(document);

    if (start === null) {
      if (document.status === "complete") return this.outcomeOf(document);
      log.info({ status: document.status }, "All stage outputs present, completing");
      const completed = await this.update(document.id, {
        status: "complete",
        ...CLEARED_ERROR,
      });
      return this.outcomeOf(completed);
    }

    const stages = stagesFrom(start, document);
    log.info({ from: document.status, start, stages }, "Reconciling document");

    // Only a failed document is reopened; an interrupted one keeps its status
    // and runs the missing stages without moving back.
    const resumed =
      document.status === "failed"
        ? await this.update(document.id, { status: STATUS_FOR_STAGE[start], ...CLEARED_ERROR })
        : document;

    return this.run({ document: resumed, log, stageReached: resumed.stageReached }, stages);
  }

  private async run(ctx: RunContext, stages: IngestionStage[]): Promise<IngestionOutcome> {
    const startedAt = Date.now();

    try {
      for (const stage of stages) {
        await this.runStage(ctx, stage);
      }
    } catch (error: unknown) {
      return this.fail(ctx, error);
    }

    assertTransition(ctx.document.status, "complete");
    const completed = await this.update(ctx.document.id, {
      status: "complete",
      ...CLEARED_ERROR,
    });
    ctx.log.info(
      {
        durationMs: Date.now() - startedAt,
        pdfType: completed.pdfType,
        entityCount: completed.entityCount,
        chunkCount: completed.chunkCount,
      },
      "Ingestion complete",
    );
    return this.outcomeOf(completed);
  }

  private async runStage(ctx: RunContext, stage: IngestionStage): Promise<void> {
    await this.checkCancellation(ctx, stage);

    const status = statusForStage(stage, ctx.document.status);
    try {
      assertTransition(ctx.document.status, status);
      ctx.document = await this.update(ctx.document.id, { status, stageReached: stage });
    } catch (error: unknown) {
      throw new StageFailure(stage, error);
    }
    ctx.stageReached = stage;

    const log = createChildLogger(ctx.log, { stage });
    const startedAt = Date.now();
    log.info("Stage started");

    try {
      await this.execute(ctx, stage, log);
    } catch (error: unknown) {
      throw new StageFailure(stage, error);
    }

    log.info({ durationMs: Date.now() - startedAt }, "Stage finished");
  }

  private async execute(ctx: RunContext, stage: IngestionStage, log: Logger): Promise<void> {
    const { timeouts } = this.deps;
    const documentId = ctx.document.id;

    switch (stage) {
      case "extract_text": {
        const { storagePath, mimeType } = ctx.document;
        const bytes = await withTimeout("storage read", timeouts.storageMs, () =>
          this.deps.storage.read(storagePath),
        );
        const parsed = await withTimeout("text extraction", timeouts.textExtractionMs, () =>
          this.deps.parser.parse(bytes, mimeType),
        );
        ctx.document = await this.update(documentId, {
          extractedText: parsed.text,
          pageCount: parsed.pageCount,
          pageOffsets: parsed.pageOffsets,
        });
        log.debug({ pageCount: parsed.pageCount, ...parsed.metadata }, "Text extracted");
        return;
      }

      case "classify": {
        const result = this.classifier(this.textOf(ctx));
        ctx.document = await this.update(documentId, {
          pdfType: result.pdfType,
          classificationScores: result.scores,
        });
        log.info({ pdfType: result.pdfType, reason: result.reason }, "Document classified");
        return;
      }

      case "extract_entities": {
        const pdfType: PdfType = ctx.document.pdfType;
        if (pdfType === "unknown") {
          log.info("No extractor for unknown type, continuing without entities");
        }
        ctx.entities = this.extractors[pdfType].extract(this.textOf(ctx));
        log.info({ pdfType, entityCount: ctx.entities.length }, "Entities extracted");
        return;
      }

      case "chunk": {
        ctx.chunks = chunkText(this.textOf(ctx), this.deps.chunking);
        log.info({ chunkCount: ctx.chunks.length }, "Text chunked");
        return;
      }

      case "embed": {
        ctx.records = await this.embed(ctx, log);
        return;
      }

      case "persist_entities": {
        const result = await this.relationalPersister.persist(documentId, ctx.entities ?? []);
        if (result === "already_persisted") {
          log.warn("Entities were already persisted, keeping the existing rows");
        }
        ctx.document = await this.load(documentId);
        return;
      }

      case "persist_vectors": {
        await this.vectorPersister.persist(documentId, ctx.records ?? [], log);
        ctx.document = await this.load(documentId);
        return;
      }
    }
  }

  private async embed(ctx: RunContext, log: Logger): Promise<EmbeddingRecord[]> {
    const chunks = ctx.chunks ?? [];
    if (chunks.length === 0) return [];

    const { document } = ctx;
    const pageOffsets = document.pageOffsets ?? [];
    const texts = chunks.map((c) => c.content);
    const result = await withRetry(
      () =>
        withTimeout("embedding", this.deps.timeouts.embeddingMs, (signal) =>
          this.deps.embeddingProvider.batchEmbed(texts, { signal }),
        ),
      {
        ...this.retryOptions,
        onRetry: ({ attempt, maxRetries, delayMs, error }) => {
          log.warn(
            { attempt, maxRetries, delayMs, err: error },
            "Embedding attempt failed, retrying",
          );
        },
      },
    );

    if (result.embeddings.length !== chunks.length) {
      throw new Error(
        `Embedding provider returned ${String(result.embeddings.length)} vectors for ${String(chunks.length)} chunks`,
      );
    }

    log.info({ model: result.model, tokensUsed: result.tokensUsed }, "Chunks embedded");

    return chunks.map((chunk, i) => ({
      documentId: document.id,
      chunkIndex: chunk.index,
      vector: result.embeddings[i] ?? [],
      content: chunk.content,
      metadata: {
        documentId: document.id,
        chunkIndex: chunk.index,
        pdfType: document.pdfType,
        pdfName: document.pdfName,
        pageNumber: pageNumberAt(pageOffsets, chunk.metadata.startChar),
        startChar: chunk.metadata.startChar,
        endChar: chunk.metadata.endChar,
      },
    }));
  }

  private async checkCancellation(ctx: RunContext, next: IngestionStage): Promise<void> {
    const current = await this.load(ctx.document.id);
    if (current.cancelRequestedAt) {
      throw new StageFailure(
        next,
        new IngestionCancelledError(`Ingestion cancelled before ${next}`),
      );
    }
  }

  /**
   * Records the failure on the document. Only a failure to write that
   * record escapes, so the job runner can try again.
   */
  private async fail(ctx: RunContext, error: unknown): Promise<IngestionOutcome> {
    const cause = error instanceof StageFailure ? error.original : error;
    const kind = errorKindOf(cause);
    // A cancelled run stopped between stages; it belongs to the last one that ran.
    const stage =
      error instanceof StageFailure && kind !== "Cancelled"
        ? error.stage
        : (ctx.stageReached ?? "extract_text");
    const message = scrubSecrets(errorMessageOf(cause));
    const stageError: StageError = {
      stage,
      kind,
      code: AppError.isAppError(cause) ? cause.code : "INTERNAL_ERROR",
      message,
    };

    ctx.log.error(
      { stage, errorKind: stageError.kind, code: stageError.code, err: cause },
      "Ingestion failed",
    );

    const failed = await this.update(ctx.document.id, {
      status: "failed",
      stageReached: ctx.stageReached,
      errorKind: stageError.kind,
      errorCode: stageError.code,
      errorDetail: `${stage}: ${message}`,
    });

    return { ...this.outcomeOf(failed), error: stageError };
  }

  private textOf(ctx: RunContext): string {
    const text = ctx.document.extractedText;
    if (text === null) {
      throw new Error(`Document ${ctx.document.id} has no extracted text`);
    }
    return text;
  }

  private async load(documentId: string): Promise<Document> {
    const document = await withTimeout(
      "relational store read",
      this.deps.timeouts.relationalStoreMs,
      () => this.deps.repository.findById(documentId),
    );
    if (!document) throw new NotFoundError(`Document ${documentId} not found`);
    return document;
  }

  private update(documentId: string, patch: DocumentPatch): Promise<Document> {
    return withTimeout("relational store write", this.deps.timeouts.relationalStoreMs, () =>
      this.deps.repository.update(documentId, patch),
    );
  }

  private outcomeOf(document: Document): IngestionOutcome {
    const status = document.status === "complete" ? "complete" : "failed";
    const outcome: IngestionOutcome = {
      documentId: document.id,
      status,
      stageReached: document.stageReached,
      entityCount: document.entityCount,
      chunkCount: document.chunkCount,
    };
    if (status === "failed" && document.errorKind) {
      outcome.error = {
        stage: document.stageReached ?? "extract_text",
        kind: document.errorKind,
        code: document.errorCode ?? "INTERNAL_ERROR",
        message: document.errorDetail ?? "",
      };
    }
    return outcome;
  }
}
