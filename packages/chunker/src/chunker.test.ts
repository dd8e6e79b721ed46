import { describe, it, expect } from "vitest";
import type { ChunkingConfig } from "@wikindex/types";
import { ParagraphChunker } from "./paragraph-chunker.js";
import { countWords, passageId, splitParagraphs, splitSentences } from "./text-utils.js";

const config: ChunkingConfig = { minWords: 30, maxWords: 300, targetWords: 200 };

/** `n` distinct words: `tag1 tag2 ... tagN`. */
function words(n: number, tag: string): string {
  return Array.from({ length: n }, (_, i) => `${tag}${String(i + 1)}`).join(" ");
}

/** A sentence of exactly `n` words ending in a full stop. */
function sentence(n: number, tag: string): string {
  return `${words(n, tag)}.`;
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

describe("text utils", () => {
  it("counts whitespace-separated words", () => {
    expect(countWords("  one two\tthree\nfour  ")).toBe(4);
    expect(countWords("")).toBe(0);
  });

  it("splits paragraphs on blank lines and drops empties", () => {
    expect(splitParagraphs("First para.\n\n\n  \n\nSecond para.\n\n")).toEqual([
      "First para.",
      "Second para.",
    ]);
  });

  it("keeps single newlines inside a paragraph", () => {
    expect(splitParagraphs("line one\nline two")).toEqual(["line one\nline two"]);
  });

  it("splits sentences after terminal punctuation followed by whitespace", () => {
    expect(splitSentences("One. Two! Three? Four")).toEqual(["One.", "Two!", "Three?", "Four"]);
    expect(splitSentences("Version 2.5 is out.")).toEqual(["Version 2.5 is out."]);
  });

  it("derives passage ids from title and index", () => {
    expect(passageId("Albert Einstein", 3)).toBe("Albert_Einstein_3");
  });
});

describe("ParagraphChunker", () => {
  const chunker = new ParagraphChunker();

  it("has strategy 'paragraph'", () => {
    expect(chunker.strategy).toBe("paragraph");
  });

  it("splits two paragraphs that together exceed maxWords", () => {
    const p1 = words(180, "a");
    const p2 = words(150, "b");

    const passages = chunker.chunk(`${p1}\n\n${p2}`, "Two Paragraphs", config);

    expect(passages).toEqual([
      { id: "Two_Paragraphs_0", title: "Two Paragraphs", text: p1, chunkIndex: 0 },
      { id: "Two_Paragraphs_1", title: "Two Paragraphs", text: p2, chunkIndex: 1 },
    ]);
  });

  it("packs paragraphs that fit together into one passage", () => {
    const p1 = words(100, "a");
    const p2 = words(150, "b");

    const passages = chunker.chunk(`${p1}\n\n${p2}`, "Packed", config);

    expect(passages.map((p) => p.text)).toEqual([`${p1} ${p2}`]);
  });

  it("emits nothing for text under minWords", () => {
    expect(chunker.chunk("Too short to index.", "Stub", config)).toEqual([]);
  });

  it("emits nothing for empty text", () => {
    expect(chunker.chunk("", "Empty", config)).toEqual([]);
  });

  it("splits an oversized paragraph at sentence boundaries", () => {
    const s1 = sentence(130, "a");
    const s2 = sentence(130, "b");
    const s3 = sentence(140, "c");

    const passages = chunker.chunk(`${s1} ${s2} ${s3}`, "Long", config);

    expect(passages.map((p) => p.text)).toEqual([`${s1} ${s2}`, s3]);
    expect(passages.map((p) => countWords(p.text))).toEqual([260, 140]);
  });

  it("lets an undersized accumulator grow past maxWords instead of flushing", () => {
    const p1 = words(10, "a");
    const p2 = words(295, "b");

    const passages = chunker.chunk(`${p1}\n\n${p2}`, "Grow", config);

    expect(passages).toHaveLength(1);
    expect(countWords(passages[0]?.text ?? "")).toBe(305);
  });

  it("drops a trailing remainder under minWords", () => {
    const p1 = words(250, "a");
    const p2 = words(280, "b");
    const p3 = words(25, "c");

    const passages = chunker.chunk(`${p1}\n\n${p2}\n\n${p3}`, "Tail", config);

    expect(passages.map((p) => p.text)).toEqual([p1, p2]);
  });

  it("never splits a single sentence longer than maxWords", () => {
    const lone = sentence(350, "a");

    const passages = chunker.chunk(lone, "Lone", config);

    expect(passages.map((p) => p.text)).toEqual([lone]);
  });

  it("flushes between sentences of different paragraphs consistently", () => {
    const intro = words(40, "i");
    const long = [sentence(120, "a"), sentence(120, "b"), sentence(120, "c")].join(" ");

    const passages = chunker.chunk(`${intro}\n\n${long}`, "Mixed", config);

    // intro (40) + a (120) + b (120) = 280; adding c would exceed 300
    expect(passages.map((p) => countWords(p.text))).toEqual([280, 120]);
  });

  it("assigns a contiguous zero-based chunkIndex", () => {
    const text = Array.from({ length: 7 }, (_, i) => words(120, `p${String(i)}x`)).join("\n\n");

    const passages = chunker.chunk(text, "Many", config);

    expect(passages.map((p) => p.chunkIndex)).toEqual(passages.map((_, i) => i));
    expect(passages.map((p) => p.id)).toEqual(passages.map((_, i) => `Many_${String(i)}`));
  });

  it("preserves the input order of text across passages", () => {
    // Deterministic pseudo-random paragraph/sentence lengths
    let seed = 7;
    const next = (max: number): number => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return 1 + (seed % max);
    };

    for (let doc = 0; doc < 20; doc++) {
      const paragraphs: string[] = [];
      const paragraphCount = next(8);
      for (let p = 0; p < paragraphCount; p++) {
        const sentences: string[] = [];
        const sentenceCount = next(6);
        for (let s = 0; s < sentenceCount; s++) {
          sentences.push(sentence(next(90), `d${String(doc)}p${String(p)}s${String(s)}w`));
        }
        paragraphs.push(sentences.join(" "));
      }
      const text = paragraphs.join("\n\n");

      const passages = chunker.chunk(text, `Doc ${String(doc)}`, config);
      const rebuilt = normalizeWhitespace(passages.map((p) => p.text).join(" "));

      expect(normalizeWhitespace(text).startsWith(rebuilt)).toBe(true);
      for (const passage of passages) {
        expect(countWords(passage.text)).toBeGreaterThanOrEqual(config.minWords);
      }
    }
  });
});
