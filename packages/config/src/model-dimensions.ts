/**
 * Output dimensionality of the embedding models we know about. The collection
 * is created with this size, so it must match what the embedder returns.
 */
export const MODEL_DIMENSIONS: Readonly<Record<string, number>> = {
  "all-MiniLM-L6-v2": 384,
  "sentence-transformers/all-MiniLM-L6-v2": 384,
  "Xenova/all-MiniLM-L6-v2": 384,
  "mixedbread-ai/mxbai-embed-large-v1": 1024,
  "nomic-ai/nomic-embed-text-v1.5": 768,
  "embed-english-v3.0": 1024,
  "embed-multilingual-v3.0": 1024,
  "embed-v4.0": 1536,
};

export const DEFAULT_DIMENSIONS = 384;

export function resolveDimensions(model: string): number {
  return MODEL_DIMENSIONS[model] ?? DEFAULT_DIMENSIONS;
}
