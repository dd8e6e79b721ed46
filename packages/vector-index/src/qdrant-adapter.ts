import { QdrantClient } from "@qdrant/js-client-rest";
import { ExternalServiceError, errorMessage } from "@wikindex/errors";
import type {
  CollectionState,
  CreateCollectionParams,
  QdrantConfig,
  UpsertOptions,
  VectorPoint,
} from "@wikindex/types";
import type { IVectorIndex } from "./vector-index.interface.js";
import { toCollectionState } from "./collection-info.js";

export type QdrantIndexConfig = Pick<QdrantConfig, "url" | "apiKey" | "timeoutMs">;

export class QdrantVectorIndex implements IVectorIndex {
  private client: QdrantClient;

  constructor(config: QdrantIndexConfig) {
    this.client = new QdrantClient({
      url: config.url,
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      checkCompatibility: false,
    });
  }

  async listCollections(): Promise<string[]> {
    const response = await this.call("list collections", () => this.client.getCollections());
    return response.collections.map((c) => c.name);
  }

  async getCollection(name: string): Promise<CollectionState> {
    const info = await this.call(`get collection ${name}`, () => this.client.getCollection(name));
    return toCollectionState(name, info);
  }

  async createCollection(name: string, params: CreateCollectionParams): Promise<void> {
    await this.call(`create collection ${name}`, () =>
      this.client.createCollection(name, {
        vectors: {
          size: params.dimension,
          distance: params.distance,
          quantization_config: params.binaryQuantization
            ? { binary: { always_ram: true } }
            : undefined,
        },
        optimizers_config: params.indexingEnabled === false ? { indexing_threshold: 0 } : undefined,
      }),
    );
  }

  async deleteCollection(name: string): Promise<void> {
    await this.call(`delete collection ${name}`, () => this.client.deleteCollection(name));
  }

  async setIndexingThreshold(name: string, threshold: number): Promise<void> {
    await this.call(`update collection ${name}`, () =>
      this.client.updateCollection(name, {
        optimizers_config: { indexing_threshold: threshold },
      }),
    );
  }

  async upsert(name: string, points: VectorPoint[], options: UpsertOptions): Promise<void> {
    if (points.length === 0) return;

    await this.call(`upsert ${points.length} points into ${name}`, () =>
      this.client.upsert(name, {
        wait: options.wait,
        points: points.map((p) => ({
          id: p.id,
          vector: p.vector,
          payload: {
            text: p.payload.text,
            title: p.payload.title,
            chunk_index: p.payload.chunk_index,
            passage_id: p.payload.passage_id,
          },
        })),
      }),
    );
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new ExternalServiceError(`Qdrant ${operation} failed: ${errorMessage(err)}`, "qdrant", {
        cause: err,
      });
    }
  }
}
