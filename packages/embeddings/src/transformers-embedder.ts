import { DependencyUnavailableError, ExternalServiceError, errorMessage } from "@wikindex/errors";
import type { EmbeddingResult } from "@wikindex/types";
import type { IEmbedder } from "./embedder.interface.js";
import { assertVectorCount } from "./vector-count.js";

const TRANSFORMERS_PACKAGE = "@xenova/transformers";
const HUB_NAMESPACE = "Xenova";

/** Output of a feature-extraction pipeline: a row-major [batch, dims] tensor. */
export interface EmbeddingTensor {
  data: ArrayLike<number>;
  dims: number[];
}

export type FeatureExtractor = (
  texts: string[],
  options: { pooling: "mean"; normalize: boolean },
) => Promise<EmbeddingTensor>;

export type FeatureExtractorLoader = (model: string) => Promise<FeatureExtractor>;

export interface TransformersEmbedderConfig {
  model: string;
  dimensions: number;
  /** Replaces the @xenova/transformers pipeline, e.g. in tests. */
  loader?: FeatureExtractorLoader;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isTensor(value: unknown): value is EmbeddingTensor {
  return (
    isRecord(value) &&
    Array.isArray(value["dims"]) &&
    isRecord(value["data"]) &&
    typeof value["data"]["length"] === "number"
  );
}

/**
 * Bare model names resolve to the ONNX conversions published under the
 * Xenova namespace on the Hugging Face hub.
 */
export function toHubModelId(model: string): string {
  return model.includes("/") ? model : `${HUB_NAMESPACE}/${model}`;
}

/** Load the feature-extraction pipeline from the optional transformers package. */
export const loadTransformersPipeline: FeatureExtractorLoader = async (model) => {
  // Optional dependency, resolved at run time only
  const specifier: string = TRANSFORMERS_PACKAGE;
  let mod: unknown;
  try {
    mod = await import(specifier);
  } catch (err) {
    throw new DependencyUnavailableError(TRANSFORMERS_PACKAGE, "local embeddings", { cause: err });
  }

  const pipeline = isRecord(mod) ? mod["pipeline"] : undefined;
  if (typeof pipeline !== "function") {
    throw new DependencyUnavailableError(TRANSFORMERS_PACKAGE, "local embeddings", {
      details: { reason: "module has no pipeline export" },
    });
  }

  const extractor: unknown = await pipeline("feature-extraction", toHubModelId(model));
  if (typeof extractor !== "function") {
    throw new ExternalServiceError(`Could not create a pipeline for ${model}`, "transformers");
  }

  return async (texts, options) => {
    const output: unknown = await extractor(texts, options);
    if (!isTensor(output)) {
      throw new ExternalServiceError("Unexpected feature-extraction output", "transformers");
    }
    return output;
  };
};

/** Split a row-major tensor into one plain vector per row. */
export function tensorRows(tensor: EmbeddingTensor): number[][] {
  const [rows = 0, width = 0] = tensor.dims;
  const vectors: number[][] = [];
  for (let r = 0; r < rows; r++) {
    vectors.push(Array.from({ length: width }, (_, c) => tensor.data[r * width + c] ?? 0));
  }
  return vectors;
}

/** Local sentence embeddings (mean pooled, L2 normalized), loaded lazily. */
export class TransformersEmbedder implements IEmbedder {
  readonly name = "local";
  readonly model: string;
  readonly dimensions: number;
  private readonly loader: FeatureExtractorLoader;
  private extractor: Promise<FeatureExtractor> | null = null;

  constructor(config: TransformersEmbedderConfig) {
    this.model = config.model;
    this.dimensions = config.dimensions;
    this.loader = config.loader ?? loadTransformersPipeline;
  }

  async embed(texts: string[]): Promise<EmbeddingResult> {
    if (texts.length === 0) {
      return { embeddings: [], model: this.model, tokensUsed: 0, dimensions: this.dimensions };
    }

    const extractor = await this.getExtractor();
    let tensor: EmbeddingTensor;
    try {
      tensor = await extractor(texts, { pooling: "mean", normalize: true });
    } catch (err) {
      throw new ExternalServiceError(`Local embedding failed: ${errorMessage(err)}`, "transformers", {
        cause: err,
      });
    }

    const result: EmbeddingResult = {
      embeddings: tensorRows(tensor),
      model: this.model,
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
    assertVectorCount(result, texts.length, this.name);
    return result;
  }

  private async getExtractor(): Promise<FeatureExtractor> {
    this.extractor ??= this.loader(this.model);
    try {
      return await this.extractor;
    } catch (err) {
      this.extractor = null;
      throw err;
    }
  }
}
