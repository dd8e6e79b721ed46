export interface Passage {
  id: string;
  title: string;
  text: string;
  chunkIndex: number;
}

/** On-disk form of a {@link Passage}, one JSON object per line. */
export interface PassageRecord {
  id: string;
  title: string;
  text: string;
  chunk_index: number;
}

export interface ChunkingConfig {
  minWords: number;
  maxWords: number;
  /** Soft target MAX_WORDS is sized against. Not enforced. */
  targetWords: number;
}

export interface PassageReadStats {
  read: number;
  skipped: number;
  malformed: number;
}
