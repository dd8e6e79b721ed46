import { z } from "zod";
import type { Passage, PassageRecord } from "@wikindex/types";

export const passageRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  text: z.string(),
  chunk_index: z.number().int().nonnegative(),
});

export function toRecord(passage: Passage): PassageRecord {
  return {
    id: passage.id,
    title: passage.title,
    text: passage.text,
    chunk_index: passage.chunkIndex,
  };
}

export function fromRecord(record: PassageRecord): Passage {
  return {
    id: record.id,
    title: record.title,
    text: record.text,
    chunkIndex: record.chunk_index,
  };
}

/** Serialize passages as newline-terminated JSONL. */
export function serializePassages(passages: readonly Passage[]): string {
  return passages.map((p) => `${JSON.stringify(toRecord(p))}\n`).join("");
}
