import type { EmbeddingResult } from "@wikindex/types";
import type { IEmbedder } from "./embedder.interface.js";

export interface CloudInferenceEmbedderConfig {
  model: string;
  dimensions: number;
}

/**
 * Defers embedding to the vector index: each text becomes an inference
 * document the server embeds on upsert. Makes no network calls itself.
 */
export class CloudInferenceEmbedder implements IEmbedder {
  readonly name = "cloud";
  readonly model: string;
  readonly dimensions: number;

  constructor(config: CloudInferenceEmbedderConfig) {
    this.model = config.model;
    this.dimensions = config.dimensions;
  }

  async embed(texts: string[]): Promise<EmbeddingResult> {
    return {
      embeddings: texts.map((text) => ({ text, model: this.model })),
      model: this.model,
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }
}
