import { Command } from "commander";
import { createContext, type ContextLoader } from "./context.js";
import { downloadCommand } from "./commands/download.js";
import { chunkCommand } from "./commands/chunk.js";
import { uploadCommand } from "./commands/upload.js";
import { statusCommand } from "./commands/status.js";

export function createProgram(load: ContextLoader = () => createContext()): Command {
  return new Command()
    .name("wikindex")
    .description("Chunk a Wikipedia dump into passages and index them in Qdrant")
    .version("0.1.0")
    .addCommand(downloadCommand(load))
    .addCommand(chunkCommand(load))
    .addCommand(uploadCommand(load))
    .addCommand(statusCommand(load));
}
