import { CohereClient } from "cohere-ai";
import { ExternalServiceError, errorMessage } from "@wikindex/errors";
import type { EmbeddingResult } from "@wikindex/types";
import type { IEmbedder } from "./embedder.interface.js";
import { assertVectorCount } from "./vector-count.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1536;
const BATCH_SIZE = 96; // Cohere limit

/** The slice of the Cohere client this embedder calls. */
export interface CohereEmbedClient {
  v2: {
    embed(request: {
      texts: string[];
      model: string;
      inputType: "search_document";
      embeddingTypes: "float"[];
    }): Promise<{
      embeddings: { float?: number[][] };
      meta?: { billedUnits?: { inputTokens?: number } };
    }>;
  };
}

export interface CohereEmbedderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  client?: CohereEmbedClient;
}

export class CohereEmbedder implements IEmbedder {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  private client: CohereEmbedClient;

  constructor(config: CohereEmbedderConfig) {
    this.client = config.client ?? new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(texts: string[]): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      let response: Awaited<ReturnType<CohereEmbedClient["v2"]["embed"]>>;
      try {
        response = await this.client.v2.embed({
          texts: batch,
          model: this.model,
          inputType: "search_document",
          embeddingTypes: ["float"],
        });
      } catch (err) {
        throw new ExternalServiceError(`Cohere embed failed: ${errorMessage(err)}`, "cohere", {
          cause: err,
        });
      }

      if (response.embeddings.float) {
        allEmbeddings.push(...response.embeddings.float);
      }
      totalTokens += response.meta?.billedUnits?.inputTokens ?? 0;
    }

    const result: EmbeddingResult = {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
    assertVectorCount(result, texts.length, this.name);
    return result;
  }
}
