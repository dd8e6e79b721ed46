export type { IChunker } from "./chunker.interface.js";
export { ParagraphChunker } from "./paragraph-chunker.js";
export { countWords, splitParagraphs, splitSentences, passageId } from "./text-utils.js";
