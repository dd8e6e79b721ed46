import { Command, InvalidArgumentError } from "commander";
import { ParagraphChunker } from "@wikindex/chunker";
import { runChunkStage } from "@wikindex/core";
import { WikitextNormalizer } from "@wikindex/normalizer";
import type { ContextLoader } from "../context.js";

interface ChunkCommandOptions {
  fresh?: boolean;
  limit?: number;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function chunkCommand(load: ContextLoader): Command {
  return new Command("chunk")
    .description("Split dump articles into passages (resumes by article title)")
    .option("--fresh", "Truncate the passage store and start over")
    .option("--limit <n>", "Stop after n newly chunked articles", parsePositiveInt)
    .action(async (options: ChunkCommandOptions) => {
      const { config, logger } = load();
      await runChunkStage(
        {
          dumpFile: config.paths.dumpFile,
          passagesFile: config.paths.passagesFile,
          chunking: config.chunking,
          fresh: options.fresh,
          limit: options.limit,
        },
        { normalizer: new WikitextNormalizer(), chunker: new ParagraphChunker(), logger },
      );
    });
}
