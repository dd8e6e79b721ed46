import wtf from "wtf_wikipedia";
import type { ITextNormalizer } from "./normalizer.interface.js";
import { collapseWhitespace } from "./whitespace.js";

export type WikitextParser = (wikitext: string) => string;

const parseWithWtf: WikitextParser = (wikitext) => wtf(wikitext).text();

/**
 * MediaWiki markup to plain text.
 * Templates, references, tables and link syntax are dropped by wtf_wikipedia;
 * paragraphs stay separated by blank lines so the chunker can see them.
 */
export class WikitextNormalizer implements ITextNormalizer {
  readonly format = "wikitext";
  private parse: WikitextParser;

  constructor(parse: WikitextParser = parseWithWtf) {
    this.parse = parse;
  }

  normalize(raw: string): string {
    try {
      return collapseWhitespace(this.parse(raw));
    } catch {
      // Unparseable markup yields an empty article
      return "";
    }
  }
}
