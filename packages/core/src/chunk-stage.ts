import { countWords, type IChunker } from "@wikindex/chunker";
import { createDumpReadStats, openDump, readArticles } from "@wikindex/dump-reader";
import { createChildLogger, type Logger } from "@wikindex/logger";
import type { ITextNormalizer } from "@wikindex/normalizer";
import { PassageWriter, readTitles } from "@wikindex/passage-store";
import type { Article, ChunkingConfig, ChunkStageResult, DumpReadStats } from "@wikindex/types";

const DEFAULT_PROGRESS_EVERY = 1000;

export interface ChunkStageOptions {
  dumpFile: string;
  passagesFile: string;
  chunking: ChunkingConfig;
  /** Truncate the store instead of resuming. */
  fresh?: boolean;
  /** Stop after this many newly chunked articles. */
  limit?: number;
  progressEvery?: number;
}

export interface ChunkStageDependencies {
  normalizer: ITextNormalizer;
  chunker: IChunker;
  logger: Logger;
  /** Article source; defaults to reading `dumpFile`. */
  articles?: AsyncIterable<Article>;
}

async function openArticles(dumpFile: string, stats: DumpReadStats): Promise<AsyncIterable<Article>> {
  return readArticles(await openDump(dumpFile), { stats });
}

/**
 * Turn dump articles into passages appended to the store. An article whose
 * title already appears in the store is skipped, so an interrupted run picks
 * up where it stopped.
 */
export async function runChunkStage(
  options: ChunkStageOptions,
  deps: ChunkStageDependencies,
): Promise<ChunkStageResult> {
  const logger = createChildLogger(deps.logger, { stage: "chunk" });
  const progressEvery = options.progressEvery ?? DEFAULT_PROGRESS_EVERY;
  const dumpStats = createDumpReadStats();

  const done = options.fresh ? new Set<string>() : await readTitles(options.passagesFile);
  if (done.size > 0) {
    logger.info({ articles: done.size }, "Resuming: articles already chunked will be skipped");
  }

  const articles = deps.articles ?? (await openArticles(options.dumpFile, dumpStats));
  const writer = await PassageWriter.open(options.passagesFile, { truncate: options.fresh });
  if (writer.repairedTornLine) {
    logger.warn({ file: options.passagesFile }, "Store ended mid-record; continuing on a new line");
  }

  const result: ChunkStageResult = { articles: 0, resumedSkipped: 0, tooShort: 0, passages: 0 };
  let processed = 0;

  try {
    for await (const article of articles) {
      if (options.limit !== undefined && processed >= options.limit) break;
      result.articles++;

      if (done.has(article.title)) {
        result.resumedSkipped++;
        continue;
      }
      processed++;

      const text = deps.normalizer.normalize(article.rawText);
      if (countWords(text) < options.chunking.minWords) {
        result.tooShort++;
      } else {
        const passages = deps.chunker.chunk(text, article.title, options.chunking);
        await writer.appendRecords(passages);
        result.passages += passages.length;
      }

      if (result.articles % progressEvery === 0) {
        logger.info({ ...result }, "Chunking progress");
      }
    }
  } finally {
    await writer.close();
  }

  logger.info(
    {
      ...result,
      pages: dumpStats.pages,
      skippedNamespace: dumpStats.skippedNamespace,
      skippedRedirect: dumpStats.skippedRedirect,
      skippedEmpty: dumpStats.skippedEmpty,
      file: options.passagesFile,
    },
    "Chunk stage complete",
  );
  return result;
}
