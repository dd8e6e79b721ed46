import { createReadStream } from "node:fs";
import { access } from "node:fs/promises";
import { createInterface } from "node:readline";
import { MalformedRecordError, UpstreamMissingError, errorMessage } from "@wikindex/errors";
import type { Passage, PassageReadStats } from "@wikindex/types";
import { fileExists } from "./fs-utils.js";
import { fromRecord, passageRecordSchema } from "./record-schema.js";

export interface ReadPassagesOptions {
  /** Leading valid passages to pass over without yielding. */
  skip?: number;
  stats?: PassageReadStats;
  onMalformed?: (err: MalformedRecordError) => void;
}

export function createPassageReadStats(): PassageReadStats {
  return { read: 0, skipped: 0, malformed: 0 };
}

export async function assertStoreExists(filePath: string): Promise<void> {
  try {
    await access(filePath);
  } catch (err) {
    throw new UpstreamMissingError(filePath, "chunk", { cause: err });
  }
}

/** Parse one JSONL line. Throws {@link MalformedRecordError} on bad input. */
export function parsePassageLine(line: string, lineNumber: number): Passage {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (err) {
    throw new MalformedRecordError(`Invalid JSON: ${errorMessage(err)}`, lineNumber, {
      cause: err,
    });
  }

  const result = passageRecordSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    const reason = issue?.message ?? "unknown";
    throw new MalformedRecordError(`Invalid passage record: ${where}${reason}`, lineNumber, {
      cause: result.error,
    });
  }
  return fromRecord(result.data);
}

/**
 * Stream passages from a JSONL store in file order. Blank lines are ignored
 * and malformed lines are counted and passed over.
 */
export async function* readPassages(
  filePath: string,
  options: ReadPassagesOptions = {},
): AsyncGenerator<Passage> {
  await assertStoreExists(filePath);

  const skip = options.skip ?? 0;
  const stats = options.stats ?? createPassageReadStats();
  const input = createReadStream(filePath, { encoding: "utf8" });
  const lines = createInterface({ input, crlfDelay: Infinity });

  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      if (line.trim().length === 0) continue;

      let passage: Passage;
      try {
        passage = parsePassageLine(line, lineNumber);
      } catch (err) {
        if (!(err instanceof MalformedRecordError)) throw err;
        stats.malformed++;
        options.onMalformed?.(err);
        continue;
      }

      if (stats.skipped < skip) {
        stats.skipped++;
        continue;
      }
      stats.read++;
      yield passage;
    }
  } finally {
    // readline does not close its input
    lines.close();
    input.destroy();
  }
}

/** Number of valid passages in the store. */
export async function countPassages(filePath: string): Promise<number> {
  const passages = readPassages(filePath);
  let count = 0;
  while (!(await passages.next()).done) count++;
  return count;
}

/** Titles present in the store; empty when the store does not exist yet. */
export async function readTitles(filePath: string): Promise<Set<string>> {
  const titles = new Set<string>();
  if (!(await fileExists(filePath))) return titles;
  for await (const passage of readPassages(filePath)) titles.add(passage.title);
  return titles;
}
