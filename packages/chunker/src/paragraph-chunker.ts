import type { ChunkingConfig, Passage } from "@wikindex/types";
import type { IChunker } from "./chunker.interface.js";
import { countWords, passageId, splitParagraphs, splitSentences } from "./text-utils.js";

/**
 * Paragraph-packing chunker.
 *
 * Packs whole paragraphs into passages of at most `maxWords` words. A paragraph
 * longer than `maxWords` is broken at sentence boundaries and its sentences are
 * packed the same way. A pending passage is only flushed once it holds at least
 * `minWords` words, so an undersized accumulator may grow past `maxWords`; a
 * trailing remainder under `minWords` is dropped.
 */
export class ParagraphChunker implements IChunker {
  readonly strategy = "paragraph";

  chunk(text: string, title: string, config: ChunkingConfig): Passage[] {
    const { minWords, maxWords } = config;
    const texts: string[] = [];

    let fragments: string[] = [];
    let words = 0;

    const flush = (): void => {
      texts.push(fragments.join(" "));
      fragments = [];
      words = 0;
    };

    const fold = (fragment: string, fragmentWords: number): void => {
      if (words + fragmentWords > maxWords && words >= minWords) {
        flush();
      }
      fragments.push(fragment);
      words += fragmentWords;
    };

    for (const paragraph of splitParagraphs(text)) {
      const paragraphWords = countWords(paragraph);

      if (paragraphWords > maxWords) {
        for (const sentence of splitSentences(paragraph)) {
          fold(sentence, countWords(sentence));
        }
      } else {
        fold(paragraph, paragraphWords);
      }
    }

    if (words >= minWords) {
      flush();
    }

    return texts.map((passageText, chunkIndex) => ({
      id: passageId(title, chunkIndex),
      title,
      text: passageText,
      chunkIndex,
    }));
  }
}
