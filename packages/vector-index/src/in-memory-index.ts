import { ExternalServiceError } from "@wikindex/errors";
import type {
  CollectionState,
  CreateCollectionParams,
  UpsertOptions,
  VectorPoint,
} from "@wikindex/types";
import type { IVectorIndex } from "./vector-index.interface.js";

const DEFAULT_INDEXING_THRESHOLD = 20000;

interface MemoryCollection {
  params: CreateCollectionParams;
  indexingThreshold: number;
  points: Map<string, VectorPoint>;
}

export interface UpsertCall {
  collection: string;
  count: number;
  wait: boolean;
}

/**
 * Process-local index keyed by point id. Stands in for Qdrant in tests and
 * dry runs; it records every upsert so callers can inspect batching.
 */
export class InMemoryVectorIndex implements IVectorIndex {
  readonly upsertCalls: UpsertCall[] = [];
  readonly thresholdUpdates: Array<{ collection: string; threshold: number }> = [];
  private collections = new Map<string, MemoryCollection>();

  async listCollections(): Promise<string[]> {
    return [...this.collections.keys()];
  }

  async getCollection(name: string): Promise<CollectionState> {
    const collection = this.require(name);
    return {
      pointCount: collection.points.size,
      dimension: collection.params.dimension,
      distance: collection.params.distance,
      indexingEnabled: collection.indexingThreshold !== 0,
    };
  }

  async createCollection(name: string, params: CreateCollectionParams): Promise<void> {
    if (this.collections.has(name)) {
      throw new ExternalServiceError(`Collection ${name} already exists`, "memory");
    }
    this.collections.set(name, {
      params,
      indexingThreshold: params.indexingEnabled === false ? 0 : DEFAULT_INDEXING_THRESHOLD,
      points: new Map(),
    });
  }

  async deleteCollection(name: string): Promise<void> {
    this.collections.delete(name);
  }

  async setIndexingThreshold(name: string, threshold: number): Promise<void> {
    this.require(name).indexingThreshold = threshold;
    this.thresholdUpdates.push({ collection: name, threshold });
  }

  async upsert(name: string, points: VectorPoint[], options: UpsertOptions): Promise<void> {
    const collection = this.require(name);
    for (const point of points) {
      if (Array.isArray(point.vector) && point.vector.length !== collection.params.dimension) {
        throw new ExternalServiceError(
          `Vector dimension error: expected dim: ${collection.params.dimension}, got ${point.vector.length}`,
          "memory",
        );
      }
    }
    for (const point of points) collection.points.set(point.id, point);
    this.upsertCalls.push({ collection: name, count: points.length, wait: options.wait });
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Stored points of a collection, in first-insert order. */
  points(name: string): VectorPoint[] {
    return [...this.require(name).points.values()];
  }

  private require(name: string): MemoryCollection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw new ExternalServiceError(`Collection ${name} not found`, "memory");
    }
    return collection;
  }
}
