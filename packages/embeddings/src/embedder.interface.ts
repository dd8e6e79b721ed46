import type { EmbeddingResult } from "@wikindex/types";

export interface IEmbedder {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;

  /** Embed a batch; the result holds one vector per input, in input order. */
  embed(texts: string[]): Promise<EmbeddingResult>;
}
