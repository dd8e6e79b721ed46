/**
 * Streaming reader for MediaWiki `pages-articles` XML exports.
 *
 * SAX-parses the dump chunk by chunk so memory stays bounded regardless of
 * dump size, and yields one {@link Article} per main-namespace, non-redirect
 * page.
 */

import { finished } from "node:stream/promises";
import Saxophone from "saxophone";
import { AppError } from "@wikindex/errors";
import type { Article, DumpReadStats } from "@wikindex/types";
import { decodeXmlEntities } from "./xml-entities.js";

/** Namespace of encyclopedia articles. */
export const MAIN_NAMESPACE = "0";

const REDIRECT_MARKER = /^#redirect/i;

interface PageDraft {
  title: string;
  ns: string;
  text: string;
}

export interface ReadArticlesOptions {
  /** Filled in while iterating; read it after the loop for skip counts. */
  stats?: DumpReadStats;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function createDumpReadStats(): DumpReadStats {
  return { pages: 0, articles: 0, skippedNamespace: 0, skippedRedirect: 0, skippedEmpty: 0 };
}

export function isRedirect(wikitext: string): boolean {
  return REDIRECT_MARKER.test(wikitext.trimStart());
}

/**
 * Yield articles from an XML byte/text stream.
 *
 * @param input - Decompressed dump content, e.g. from {@link openDump}.
 */
export async function* readArticles(
  input: AsyncIterable<string | Uint8Array>,
  options: ReadArticlesOptions = {},
): AsyncGenerator<Article> {
  const stats = options.stats ?? createDumpReadStats();
  const sax = new Saxophone();
  const stack: string[] = [];
  const completed: PageDraft[] = [];
  let draft: PageDraft | null = null;
  let parseError: Error | null = null;

  // Raw text of the current element; entities are decoded once it is complete
  // so a reference split across two chunks still decodes.
  let pending = "";

  const targetField = (): keyof PageDraft | null => {
    const element = stack[stack.length - 1];
    const parent = stack[stack.length - 2];
    if (element === "title" && parent === "page") return "title";
    if (element === "ns" && parent === "page") return "ns";
    if (element === "text" && parent === "revision") return "text";
    return null;
  };

  const commit = (): void => {
    const field = targetField();
    if (draft && field && pending) draft[field] += decodeXmlEntities(pending);
    pending = "";
  };

  sax.on("tagopen", (tag) => {
    commit();
    if (tag.isSelfClosing) return;
    stack.push(tag.name);

    if (tag.name === "page") {
      draft = { title: "", ns: "", text: "" };
    } else if (tag.name === "revision" && draft) {
      // Later revisions replace earlier ones in full-history exports
      draft.text = "";
    }
  });

  sax.on("tagclose", (tag) => {
    commit();
    stack.pop();
    if (tag.name === "page" && draft) {
      completed.push(draft);
      draft = null;
    }
  });

  sax.on("text", (node) => {
    if (targetField()) pending += node.contents;
  });

  sax.on("cdata", (node) => {
    commit();
    const field = targetField();
    if (draft && field) draft[field] += node.contents;
  });

  sax.on("error", (err) => {
    parseError ??= toError(err);
  });

  const write = (chunk: string): Promise<void> =>
    new Promise((resolve, reject) => {
      sax.write(chunk, (err) => (err ? reject(err) : resolve()));
    });

  function* drain(): Generator<Article> {
    for (const page of completed.splice(0)) {
      stats.pages++;
      if (page.ns.trim() !== MAIN_NAMESPACE) {
        stats.skippedNamespace++;
      } else if (page.text.trim().length === 0) {
        stats.skippedEmpty++;
      } else if (isRedirect(page.text)) {
        stats.skippedRedirect++;
      } else {
        stats.articles++;
        yield { title: page.title.trim(), rawText: page.text };
      }
    }
  }

  const failIfBroken = (): void => {
    if (parseError) {
      throw new AppError({
        message: `Dump is not well-formed XML: ${parseError.message}`,
        code: "DUMP_MALFORMED",
        hint: "The archive may be truncated; re-run `wikindex download --force`.",
        cause: parseError,
      });
    }
  };

  // Multi-byte characters may straddle byte chunks
  const decoder = new TextDecoder("utf-8");

  for await (const chunk of input) {
    try {
      await write(typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true }));
    } catch (err) {
      parseError ??= toError(err);
    }
    failIfBroken();
    yield* drain();
  }

  const tail = decoder.decode();
  sax.end(tail.length > 0 ? tail : undefined);
  try {
    await finished(sax);
  } catch (err) {
    parseError ??= toError(err);
  }
  if (stack.length > 0) {
    parseError ??= new Error(`input ended inside <${stack.join("><")}>`);
  }
  failIfBroken();
  yield* drain();
}
