import { mkdir, open, stat, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import type { Passage } from "@wikindex/types";
import { isNotFound } from "./fs-utils.js";
import { serializePassages } from "./record-schema.js";

export interface OpenWriterOptions {
  /** Discard existing content instead of appending to it. */
  truncate?: boolean;
}

/**
 * Append-only JSONL writer. Each {@link appendRecords} call issues a single
 * write so an article's passages land together or not at all.
 */
export class PassageWriter {
  private written = 0;

  private constructor(
    private readonly handle: FileHandle,
    private needsNewline: boolean,
  ) {}

  static async open(filePath: string, options: OpenWriterOptions = {}): Promise<PassageWriter> {
    await mkdir(dirname(filePath), { recursive: true });

    if (options.truncate) {
      return new PassageWriter(await open(filePath, "w"), false);
    }

    const torn = await endsWithoutNewline(filePath);
    return new PassageWriter(await open(filePath, "a"), torn);
  }

  /** Passages written through this writer, across all calls. */
  get count(): number {
    return this.written;
  }

  /** True if the file was found with an unterminated last line. */
  get repairedTornLine(): boolean {
    return this.needsNewline;
  }

  async appendRecords(passages: readonly Passage[]): Promise<void> {
    if (passages.length === 0) return;

    let data = serializePassages(passages);
    if (this.needsNewline) {
      data = `\n${data}`;
      this.needsNewline = false;
    }
    await this.handle.appendFile(data, "utf8");
    this.written += passages.length;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

async function endsWithoutNewline(filePath: string): Promise<boolean> {
  let size: number;
  try {
    size = (await stat(filePath)).size;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
  if (size === 0) return false;

  const handle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(1);
    await handle.read(buffer, 0, 1, size - 1);
    return buffer[0] !== 0x0a;
  } finally {
    await handle.close();
  }
}
