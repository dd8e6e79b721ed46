import { v5 as uuidv5 } from "uuid";
import type { Passage, PointVector, VectorPoint } from "@wikindex/types";

/** Stable point id for a passage: re-uploading a passage overwrites its point. */
export function pointId(passageId: string): string {
  return uuidv5(passageId, uuidv5.URL);
}

export function toPoint(passage: Passage, vector: PointVector): VectorPoint {
  return {
    id: pointId(passage.id),
    vector,
    payload: {
      text: passage.text,
      title: passage.title,
      chunk_index: passage.chunkIndex,
      passage_id: passage.id,
    },
  };
}
