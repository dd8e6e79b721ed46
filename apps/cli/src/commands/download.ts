import { Command } from "commander";
import { downloadDump } from "@wikindex/core";
import type { ContextLoader } from "../context.js";

interface DownloadCommandOptions {
  force?: boolean;
}

export function downloadCommand(load: ContextLoader): Command {
  return new Command("download")
    .description("Download the Wikipedia dump into the data directory")
    .option("--force", "Download again even if the file exists")
    .action(async (options: DownloadCommandOptions) => {
      const { config, logger } = load();
      await downloadDump(
        { url: config.paths.dumpUrl, dest: config.paths.dumpFile, force: options.force },
        { logger },
      );
    });
}
