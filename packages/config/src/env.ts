import { z } from "zod";
import { ConfigurationError } from "@sitedocs/errors";
import type { AppConfig } from "@sitedocs/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql://",
      }),
    DATABASE_POOL_MAX: positiveInt("10"),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),
    WORKER_CONCURRENCY: positiveInt("4"),

    // ---------- Storage ----------
    STORAGE_DIR: z.string().min(1).default("./documents"),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
    QDRANT_URL: z.string().url().optional(),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().min(1).default("pdf_chunks"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),

    // ---------- Chunking ----------
    CHUNK_STRATEGY: z.enum(["fixed", "boundary"]).default("boundary"),
    CHUNK_SIZE: positiveInt("2000"),
    CHUNK_OVERLAP: nonNegativeInt("250"),

    // ---------- Retry ----------
    RETRY_MAX_ATTEMPTS: positiveInt("3"),
    RETRY_BASE_DELAY_MS: positiveInt("1000"),
    RETRY_MAX_DELAY_MS: positiveInt("10000"),

    // ---------- Timeouts ----------
    STORAGE_TIMEOUT_MS: positiveInt("10000"),
    TEXT_EXTRACTION_TIMEOUT_MS: positiveInt("60000"),
    EMBEDDING_TIMEOUT_MS: positiveInt("30000"),
    RELATIONAL_STORE_TIMEOUT_MS: positiveInt("10000"),
    VECTOR_STORE_TIMEOUT_MS: positiveInt("15000"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.VECTOR_STORE === "qdrant" && !env.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required when VECTOR_STORE is qdrant",
      });
    }
    if (env.EMBEDDING_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "OPENAI_API_KEY is required when EMBEDDING_PROVIDER is openai",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a {@link ConfigurationError} naming every invalid variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const fields: Record<string, string> = {};
    for (const issue of result.error.issues) {
      fields[issue.path.join(".")] = issue.message;
    }
    throw new ConfigurationError(
      `Invalid environment: ${Object.keys(fields).join(", ")}`,
      fields,
      { cause: result.error },
    );
  }
  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    storage: {
      rootDir: parsed.STORAGE_DIR,
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
      collectionName: parsed.QDRANT_COLLECTION,
    },

    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      openai: {
        apiKey: parsed.OPENAI_API_KEY ?? "",
        model: parsed.OPENAI_EMBEDDING_MODEL,
      },
      cohere: {
        apiKey: parsed.COHERE_API_KEY ?? "",
        model: parsed.COHERE_EMBED_MODEL,
      },
    },

    chunking: {
      strategy: parsed.CHUNK_STRATEGY,
      chunkSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },

    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
    },

    timeouts: {
      storageMs: parsed.STORAGE_TIMEOUT_MS,
      textExtractionMs: parsed.TEXT_EXTRACTION_TIMEOUT_MS,
      embeddingMs: parsed.EMBEDDING_TIMEOUT_MS,
      relationalStoreMs: parsed.RELATIONAL_STORE_TIMEOUT_MS,
      vectorStoreMs: parsed.VECTOR_STORE_TIMEOUT_MS,
    },

    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
    },
  };
}
