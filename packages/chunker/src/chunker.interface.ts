import type { ChunkingConfig, Passage } from "@wikindex/types";

export interface IChunker {
  readonly strategy: string;
  chunk(text: string, title: string, config: ChunkingConfig): Passage[];
}
