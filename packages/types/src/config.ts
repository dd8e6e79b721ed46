import type { ChunkingConfig } from "./passage.js";
import type { EmbeddingProviderType } from "./embedding.js";

export type NodeEnv = "development" | "test" | "production";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface IndexerConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  paths: PathsConfig;
  qdrant: QdrantConfig;
  embedding: EmbeddingConfig;
  pipeline: PipelineConfig;
  chunking: ChunkingConfig;
}

export interface PathsConfig {
  dataDir: string;
  dumpUrl: string;
  dumpFile: string;
  passagesFile: string;
}

export interface QdrantConfig {
  url: string;
  apiKey?: string;
  collection: string;
  timeoutMs: number;
  indexingThreshold: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  model: string;
  dimensions: number;
  cohereApiKey?: string;
}

export interface PipelineConfig {
  embedBatchSize: number;
  uploadBatchSize: number;
}
