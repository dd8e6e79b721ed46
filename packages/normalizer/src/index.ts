export type { ITextNormalizer } from "./normalizer.interface.js";
export { WikitextNormalizer } from "./wikitext-normalizer.js";
export type { WikitextParser } from "./wikitext-normalizer.js";
export { collapseWhitespace } from "./whitespace.js";
