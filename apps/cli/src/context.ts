import { parseEnv } from "@wikindex/config";
import { createEmbedder, type IEmbedder } from "@wikindex/embeddings";
import { createLogger, redactObject, type CreateLoggerOptions, type Logger } from "@wikindex/logger";
import type { IndexerConfig } from "@wikindex/types";
import { createVectorIndex, type IVectorIndex } from "@wikindex/vector-index";

/** Everything a command needs, built once per invocation. */
export interface CliContext {
  config: IndexerConfig;
  logger: Logger;
  createEmbedder(): IEmbedder;
  /** An in-memory index for dry runs, Qdrant otherwise. */
  createVectorIndex(options?: { dryRun?: boolean }): IVectorIndex;
}

export type ContextLoader = () => CliContext;

export function createContext(
  env: Record<string, string | undefined> = process.env,
  options: Pick<CreateLoggerOptions, "destination"> = {},
): CliContext {
  const config = parseEnv(env);
  const logger = createLogger({ level: config.logLevel, destination: options.destination });
  logger.debug({ config: redactObject({ ...config }) }, "Configuration loaded");

  return {
    config,
    logger,
    createEmbedder: () => createEmbedder(config.embedding),
    createVectorIndex: (options) =>
      options?.dryRun
        ? createVectorIndex({ type: "memory" })
        : createVectorIndex({ type: "qdrant", qdrant: config.qdrant }),
  };
}
