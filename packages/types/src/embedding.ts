import type { PointVector } from "./vector.js";

export type EmbeddingProviderType = "local" | "cohere" | "cloud";

export interface EmbeddingResult {
  embeddings: PointVector[];
  model: string;
  tokensUsed: number;
  dimensions: number;
}
