import path from "node:path";
import { z } from "zod";
import { ValidationError } from "@wikindex/errors";
import type { IndexerConfig } from "@wikindex/types";
import { resolveDimensions } from "./model-dimensions.js";

const DEFAULT_DUMP_URL =
  "https://dumps.wikimedia.org/simplewiki/latest/simplewiki-latest-pages-articles.xml.bz2";

/** Upload batch used when the vector index embeds server-side. */
const CLOUD_UPLOAD_BATCH_SIZE = 128;
const LOCAL_UPLOAD_BATCH_SIZE = 2048;
const DEFAULT_EMBED_BATCH_SIZE = 256;

function defaultUploadBatchSize(provider: "local" | "cohere" | "cloud"): number {
  return provider === "cloud" ? CLOUD_UPLOAD_BATCH_SIZE : LOCAL_UPLOAD_BATCH_SIZE;
}

function optionalPositiveInt() {
  return z
    .string()
    .optional()
    .transform((val) => (val === undefined ? undefined : Number(val)))
    .pipe(z.number().int().positive().optional());
}

function positiveInt(fallback: string) {
  return z.string().default(fallback).transform(Number).pipe(z.number().int().positive());
}

/**
 * Zod schema for every environment variable the indexer reads.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed IndexerConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Files ----------
    DATA_DIR: z.string().min(1).default("data"),
    DUMP_URL: z.string().url().default(DEFAULT_DUMP_URL),
    DUMP_FILE: z.string().min(1).optional(),
    PASSAGES_FILE: z.string().min(1).optional(),

    // ---------- Qdrant ----------
    QDRANT_URL: z
      .string()
      .default("http://localhost:6333")
      .refine((url) => /^https?:\/\//.test(url), {
        message: "QDRANT_URL must start with http:// or https://",
      }),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z
      .string()
      .min(1, "QDRANT_COLLECTION must not be empty")
      .default("wiki_passages"),
    QDRANT_TIMEOUT_MS: positiveInt("120000"),
    INDEXING_THRESHOLD: positiveInt("20000"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["local", "cohere", "cloud"]).default("local"),
    EMBEDDING_MODEL: z.string().min(1).default("all-MiniLM-L6-v2"),
    COHERE_API_KEY: z.string().optional(),

    // ---------- Batching ----------
    EMBED_BATCH_SIZE: optionalPositiveInt(),
    UPLOAD_BATCH_SIZE: optionalPositiveInt(),

    // ---------- Chunking ----------
    CHUNK_MIN_WORDS: positiveInt("30"),
    CHUNK_MAX_WORDS: positiveInt("300"),
    CHUNK_TARGET_WORDS: positiveInt("200"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_MIN_WORDS >= env.CHUNK_MAX_WORDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_MIN_WORDS"],
        message: "CHUNK_MIN_WORDS must be smaller than CHUNK_MAX_WORDS",
      });
    }
    const uploadBatchSize = env.UPLOAD_BATCH_SIZE ?? defaultUploadBatchSize(env.EMBEDDING_PROVIDER);
    if (env.EMBED_BATCH_SIZE !== undefined && env.EMBED_BATCH_SIZE > uploadBatchSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["EMBED_BATCH_SIZE"],
        message: "EMBED_BATCH_SIZE must not exceed UPLOAD_BATCH_SIZE",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is 'cohere'",
      });
    }
  });

function toFieldMessages(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.join(".") || "env";
    fields[key] ??= issue.message;
  }
  return fields;
}

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link IndexerConfig}.
 *
 * Throws a ValidationError listing every offending variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): IndexerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ValidationError("Invalid configuration", toFieldMessages(result.error), {
      cause: result.error,
    });
  }
  const parsed = result.data;

  const uploadBatchSize = parsed.UPLOAD_BATCH_SIZE ?? defaultUploadBatchSize(parsed.EMBEDDING_PROVIDER);
  // An unset embed batch never exceeds the upload batch
  const embedBatchSize =
    parsed.EMBED_BATCH_SIZE ?? Math.min(DEFAULT_EMBED_BATCH_SIZE, uploadBatchSize);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    paths: {
      dataDir: parsed.DATA_DIR,
      dumpUrl: parsed.DUMP_URL,
      dumpFile:
        parsed.DUMP_FILE ?? path.join(parsed.DATA_DIR, path.posix.basename(new URL(parsed.DUMP_URL).pathname)),
      passagesFile: parsed.PASSAGES_FILE ?? path.join(parsed.DATA_DIR, "passages.jsonl"),
    },

    qdrant: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collection: parsed.QDRANT_COLLECTION,
      timeoutMs: parsed.QDRANT_TIMEOUT_MS,
      indexingThreshold: parsed.INDEXING_THRESHOLD,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL,
      dimensions: resolveDimensions(parsed.EMBEDDING_MODEL),
      cohereApiKey: parsed.COHERE_API_KEY,
    },

    pipeline: {
      embedBatchSize,
      uploadBatchSize,
    },

    chunking: {
      minWords: parsed.CHUNK_MIN_WORDS,
      maxWords: parsed.CHUNK_MAX_WORDS,
      targetWords: parsed.CHUNK_TARGET_WORDS,
    },
  };
}
