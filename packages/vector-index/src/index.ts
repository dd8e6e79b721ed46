import type { QdrantConfig } from "@wikindex/types";
import type { IVectorIndex } from "./vector-index.interface.js";
import { QdrantVectorIndex } from "./qdrant-adapter.js";
import { InMemoryVectorIndex } from "./in-memory-index.js";

export type { IVectorIndex } from "./vector-index.interface.js";
export { QdrantVectorIndex } from "./qdrant-adapter.js";
export type { QdrantIndexConfig } from "./qdrant-adapter.js";
export { InMemoryVectorIndex } from "./in-memory-index.js";
export type { UpsertCall } from "./in-memory-index.js";
export { toCollectionState } from "./collection-info.js";
export type { CollectionInfoView } from "./collection-info.js";

export type VectorIndexType = "qdrant" | "memory";

export interface VectorIndexConfig {
  type: VectorIndexType;
  qdrant?: QdrantConfig;
}

export function createVectorIndex(config: VectorIndexConfig): IVectorIndex {
  switch (config.type) {
    case "qdrant":
      if (!config.qdrant) {
        throw new Error("qdrant config is required for the Qdrant vector index");
      }
      return new QdrantVectorIndex(config.qdrant);
    case "memory":
      return new InMemoryVectorIndex();
    default:
      throw new Error(`Unknown vector index type: ${String(config.type)}`);
  }
}
