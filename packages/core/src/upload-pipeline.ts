import type { IEmbedder } from "@wikindex/embeddings";
import { ExternalServiceError, ValidationError } from "@wikindex/errors";
import { createChildLogger, type Logger } from "@wikindex/logger";
import { countPassages, createPassageReadStats, readPassages } from "@wikindex/passage-store";
import type { DistanceMetric, Passage, UploadResult, VectorPoint } from "@wikindex/types";
import type { IVectorIndex } from "@wikindex/vector-index";
import { toPoint } from "./point-id.js";

export interface UploadOptions {
  passagesFile: string;
  collection: string;
  embedBatchSize: number;
  uploadBatchSize: number;
  /** Threshold restored once the run completes. */
  indexingThreshold: number;
  distance?: DistanceMetric;
  binaryQuantization?: boolean;
  /** Drop the collection before starting. */
  fresh?: boolean;
}

export interface UploadDependencies {
  embedder: IEmbedder;
  vectorIndex: IVectorIndex;
  logger: Logger;
}

export interface PreparedCollection {
  created: boolean;
  existingPoints: number;
}

/**
 * Make sure the collection exists with indexing suspended. Returns the number
 * of points already stored, which drives the resume offset.
 */
export async function prepareCollection(
  options: UploadOptions,
  deps: UploadDependencies,
): Promise<PreparedCollection> {
  const { collection } = options;
  const { vectorIndex, embedder, logger } = deps;

  let names = await vectorIndex.listCollections();
  if (options.fresh && names.includes(collection)) {
    await vectorIndex.deleteCollection(collection);
    logger.info({ collection }, "Deleted existing collection");
    names = names.filter((n) => n !== collection);
  }

  if (!names.includes(collection)) {
    await vectorIndex.createCollection(collection, {
      dimension: embedder.dimensions,
      distance: options.distance ?? "Cosine",
      indexingEnabled: false,
      binaryQuantization: options.binaryQuantization ?? false,
    });
    logger.info(
      { collection, dimension: embedder.dimensions },
      "Created collection with indexing disabled",
    );
    return { created: true, existingPoints: 0 };
  }

  const state = await vectorIndex.getCollection(collection);
  if (state.dimension !== embedder.dimensions) {
    throw new ValidationError(
      `Collection ${collection} stores ${state.dimension}-d vectors but ${embedder.model} produces ${embedder.dimensions}-d`,
      { EMBEDDING_MODEL: "dimension does not match the existing collection" },
    );
  }

  await vectorIndex.setIndexingThreshold(collection, 0);
  logger.info({ collection, points: state.pointCount }, "Collection exists, indexing disabled");
  return { created: false, existingPoints: state.pointCount };
}

/**
 * Passages to skip on resume. Only whole upload batches count as done, so a
 * partially applied batch is uploaded again.
 */
export function resumeOffset(existingPoints: number, uploadBatchSize: number): number {
  return Math.floor(existingPoints / uploadBatchSize) * uploadBatchSize;
}

/**
 * Stream passages from the store, embed them in batches and upsert them into
 * the collection. Every upsert but the last is sent without waiting for the
 * server to apply it; the last one waits. Indexing is restored at the end.
 */
export async function runUpload(
  options: UploadOptions,
  deps: UploadDependencies,
): Promise<UploadResult> {
  const { collection, embedBatchSize, uploadBatchSize } = options;
  const { embedder, vectorIndex } = deps;
  const logger = createChildLogger(deps.logger, { stage: "upload", collection });

  const total = await countPassages(options.passagesFile);
  logger.info({ total, file: options.passagesFile }, "Counted passages");

  const prepared = await prepareCollection(options, { ...deps, logger });
  const skip = resumeOffset(prepared.existingPoints, uploadBatchSize);
  if (skip > 0) {
    logger.info({ existingPoints: prepared.existingPoints, skip }, "Resuming upload");
  }
  logger.info(
    { embedder: embedder.name, model: embedder.model, embedBatchSize, uploadBatchSize },
    `Processing ${Math.max(total - skip, 0)} passages`,
  );

  const stats = createPassageReadStats();
  let embedBatch: Passage[] = [];
  let uploadBatch: VectorPoint[] = [];
  let tokensUsed = 0;
  let upsertCalls = 0;
  let uploaded = 0;

  const embedPending = async (): Promise<void> => {
    if (embedBatch.length === 0) return;
    const result = await embedder.embed(embedBatch.map((p) => p.text));
    tokensUsed += result.tokensUsed;

    embedBatch.forEach((passage, i) => {
      const vector = result.embeddings[i];
      if (vector === undefined) {
        throw new ExternalServiceError(`No vector returned for ${passage.id}`, embedder.name);
      }
      uploadBatch.push(toPoint(passage, vector));
    });
    embedBatch = [];
  };

  const upsert = async (points: VectorPoint[], wait: boolean): Promise<void> => {
    await vectorIndex.upsert(collection, points, { wait });
    upsertCalls++;
    uploaded += points.length;
    logger.info(
      { uploaded, remaining: Math.max(total - skip - uploaded, 0), wait },
      "Upserted batch",
    );
  };

  // At least one batch stays pending so the last upsert of a run is the one that waits
  const upsertFullBatches = async (): Promise<void> => {
    while (uploadBatch.length > uploadBatchSize) {
      await upsert(uploadBatch.slice(0, uploadBatchSize), false);
      uploadBatch = uploadBatch.slice(uploadBatchSize);
    }
  };

  for await (const passage of readPassages(options.passagesFile, {
    skip,
    stats,
    onMalformed: (err) =>
      logger.warn({ line: err.lineNumber, reason: err.message }, "Skipping malformed passage"),
  })) {
    embedBatch.push(passage);
    if (embedBatch.length < embedBatchSize) continue;

    await embedPending();
    await upsertFullBatches();
  }

  await embedPending();
  await upsertFullBatches();
  if (uploadBatch.length > 0) {
    await upsert(uploadBatch, true);
    uploadBatch = [];
  }

  await vectorIndex.setIndexingThreshold(collection, options.indexingThreshold);
  const finalState = await vectorIndex.getCollection(collection);

  if (stats.malformed > 0) {
    logger.warn({ malformed: stats.malformed }, "Skipped malformed passages");
  }
  logger.info(
    { points: finalState.pointCount, indexingThreshold: options.indexingThreshold },
    "Upload complete, indexing re-enabled",
  );

  return {
    collection,
    created: prepared.created,
    resumedFrom: skip,
    skipped: stats.skipped,
    uploaded,
    malformed: stats.malformed,
    tokensUsed,
    upsertCalls,
    finalPointCount: finalState.pointCount,
  };
}
