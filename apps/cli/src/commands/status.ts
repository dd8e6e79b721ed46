import { stat } from "node:fs/promises";
import { Command } from "commander";
import { redactUrl } from "@wikindex/logger";
import { countPassages, fileExists } from "@wikindex/passage-store";
import type { ContextLoader } from "../context.js";

async function fileSize(path: string): Promise<number | null> {
  return (await fileExists(path)) ? (await stat(path)).size : null;
}

export function statusCommand(load: ContextLoader): Command {
  return new Command("status")
    .description("Report the dump, passage store and collection state")
    .action(async () => {
      const context = load();
      const { config, logger } = context;

      const dumpBytes = await fileSize(config.paths.dumpFile);
      logger.info({ file: config.paths.dumpFile, present: dumpBytes !== null, bytes: dumpBytes }, "Dump");

      const storePresent = await fileExists(config.paths.passagesFile);
      const passages = storePresent ? await countPassages(config.paths.passagesFile) : 0;
      logger.info({ file: config.paths.passagesFile, present: storePresent, passages }, "Passage store");

      const vectorIndex = context.createVectorIndex();
      const collection = config.qdrant.collection;
      if (!(await vectorIndex.healthCheck())) {
        logger.warn({ url: redactUrl(config.qdrant.url) }, "Qdrant is not reachable");
        return;
      }
      const names = await vectorIndex.listCollections();
      if (!names.includes(collection)) {
        logger.info({ collection, present: false }, "Collection");
        return;
      }
      const state = await vectorIndex.getCollection(collection);
      logger.info(
        {
          collection,
          present: true,
          ...state,
          uploadedFraction: passages > 0 ? Number((state.pointCount / passages).toFixed(4)) : null,
        },
        "Collection",
      );
    });
}
