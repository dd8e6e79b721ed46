const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;
const PARAGRAPH_BOUNDARY = /\n\s*\n/;

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

/** Blank-line separated paragraphs, trimmed, empties dropped. */
export function splitParagraphs(text: string): string[] {
  return text
    .split(PARAGRAPH_BOUNDARY)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/** Split after `.`, `!` or `?` followed by whitespace. */
export function splitSentences(paragraph: string): string[] {
  return paragraph.split(SENTENCE_BOUNDARY).filter((s) => s.length > 0);
}

export function passageId(title: string, chunkIndex: number): string {
  return `${title.replaceAll(" ", "_")}_${String(chunkIndex)}`;
}
