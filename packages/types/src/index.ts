export type { Article, DumpReadStats } from "./article.js";
export type { Passage, PassageRecord, ChunkingConfig, PassageReadStats } from "./passage.js";
export type {
  DistanceMetric,
  InferenceDocument,
  PointVector,
  PointPayload,
  VectorPoint,
  CollectionState,
  CreateCollectionParams,
  UpsertOptions,
} from "./vector.js";
export type { EmbeddingProviderType, EmbeddingResult } from "./embedding.js";
export type {
  NodeEnv,
  LogLevel,
  IndexerConfig,
  PathsConfig,
  QdrantConfig,
  EmbeddingConfig,
  PipelineConfig,
} from "./config.js";
export type { ChunkStageResult, UploadResult } from "./pipeline.js";
