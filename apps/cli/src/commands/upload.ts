import { Command } from "commander";
import { runUpload } from "@wikindex/core";
import type { ContextLoader } from "../context.js";

interface UploadCommandOptions {
  fresh?: boolean;
  dryRun?: boolean;
}

export function uploadCommand(load: ContextLoader): Command {
  return new Command("upload")
    .description("Embed passages and upsert them into Qdrant (resumes by point count)")
    .option("--fresh", "Delete the collection and start over")
    .option("--dry-run", "Embed into an in-memory index instead of Qdrant")
    .action(async (options: UploadCommandOptions) => {
      const context = load();
      const { config, logger } = context;
      const embedder = context.createEmbedder();
      const vectorIndex = context.createVectorIndex({ dryRun: options.dryRun });

      const result = await runUpload(
        {
          passagesFile: config.paths.passagesFile,
          collection: config.qdrant.collection,
          embedBatchSize: config.pipeline.embedBatchSize,
          uploadBatchSize: config.pipeline.uploadBatchSize,
          indexingThreshold: config.qdrant.indexingThreshold,
          binaryQuantization: config.embedding.provider === "local",
          fresh: options.fresh,
        },
        { embedder, vectorIndex, logger },
      );

      logger.info({ ...result, dryRun: options.dryRun ?? false }, "Upload finished");
    });
}
