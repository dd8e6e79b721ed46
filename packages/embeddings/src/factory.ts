import { ValidationError } from "@wikindex/errors";
import type { EmbeddingConfig } from "@wikindex/types";
import type { IEmbedder } from "./embedder.interface.js";
import { CohereEmbedder } from "./cohere-embedder.js";
import { CloudInferenceEmbedder } from "./cloud-inference-embedder.js";
import { TransformersEmbedder } from "./transformers-embedder.js";

export function createEmbedder(config: EmbeddingConfig): IEmbedder {
  switch (config.provider) {
    case "local":
      return new TransformersEmbedder({ model: config.model, dimensions: config.dimensions });
    case "cohere":
      if (!config.cohereApiKey) {
        throw new ValidationError("COHERE_API_KEY is required when provider is 'cohere'", {
          COHERE_API_KEY: "required",
        });
      }
      return new CohereEmbedder({
        apiKey: config.cohereApiKey,
        model: config.model,
        dimensions: config.dimensions,
      });
    case "cloud":
      return new CloudInferenceEmbedder({ model: config.model, dimensions: config.dimensions });
    default:
      throw new ValidationError(`Unknown embedding provider: ${String(config.provider)}`, {
        EMBEDDING_PROVIDER: "unknown",
      });
  }
}
