#!/usr/bin/env node
import dotenv from "dotenv";
import { createLogger } from "@wikindex/logger";
import { createContext, type CliContext } from "./context.js";
import { createProgram } from "./program.js";
import { reportError } from "./report-error.js";

dotenv.config();

let context: CliContext | null = null;
const load = (): CliContext => {
  context ??= createContext();
  return context;
};

createProgram(load)
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    const logger = context?.logger ?? createLogger();
    process.exitCode = reportError(err, logger);
  });
