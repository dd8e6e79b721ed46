export type { IEmbedder } from "./embedder.interface.js";
export { CohereEmbedder } from "./cohere-embedder.js";
export type { CohereEmbedderConfig, CohereEmbedClient } from "./cohere-embedder.js";
export { CloudInferenceEmbedder } from "./cloud-inference-embedder.js";
export type { CloudInferenceEmbedderConfig } from "./cloud-inference-embedder.js";
export {
  TransformersEmbedder,
  loadTransformersPipeline,
  tensorRows,
  toHubModelId,
} from "./transformers-embedder.js";
export type {
  TransformersEmbedderConfig,
  FeatureExtractor,
  FeatureExtractorLoader,
  EmbeddingTensor,
} from "./transformers-embedder.js";
export { assertVectorCount } from "./vector-count.js";
export { createEmbedder } from "./factory.js";
