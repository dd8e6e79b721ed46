import type {
  CollectionState,
  CreateCollectionParams,
  UpsertOptions,
  VectorPoint,
} from "@wikindex/types";

export interface IVectorIndex {
  listCollections(): Promise<string[]>;
  /** Throws when the collection does not exist. */
  getCollection(name: string): Promise<CollectionState>;
  createCollection(name: string, params: CreateCollectionParams): Promise<void>;
  deleteCollection(name: string): Promise<void>;
  /** 0 disables HNSW index building; any positive value re-enables it. */
  setIndexingThreshold(name: string, threshold: number): Promise<void>;
  /** Insert or overwrite points by id. */
  upsert(name: string, points: VectorPoint[], options: UpsertOptions): Promise<void>;
  healthCheck(): Promise<boolean>;
}
