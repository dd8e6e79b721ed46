import { createReadStream } from "node:fs";
import { access } from "node:fs/promises";
import { PassThrough, type Readable, type Transform } from "node:stream";
import { createGunzip } from "node:zlib";
import unbzip2 from "unbzip2-stream";
import { UpstreamMissingError } from "@wikindex/errors";

export type DumpCompression = "bzip2" | "gzip" | "none";

export function detectCompression(filePath: string): DumpCompression {
  const lower = filePath.toLowerCase();
  if (lower.endsWith(".bz2")) return "bzip2";
  if (lower.endsWith(".gz")) return "gzip";
  return "none";
}

/**
 * Open a dump file as a UTF-8 text stream, decompressing by file extension.
 * Errors from any stage surface on the returned stream.
 */
export async function openDump(filePath: string): Promise<Readable> {
  try {
    await access(filePath);
  } catch (err) {
    throw new UpstreamMissingError(filePath, "download", { cause: err });
  }

  const source = createReadStream(filePath);
  const output = new PassThrough();
  output.setEncoding("utf8");

  const compression = detectCompression(filePath);
  let decoder: Transform | null = null;
  if (compression === "bzip2") decoder = unbzip2();
  else if (compression === "gzip") decoder = createGunzip();

  source.on("error", (err) => output.destroy(err));
  if (decoder) {
    decoder.on("error", (err: Error) => output.destroy(err));
    source.pipe(decoder).pipe(output);
  } else {
    source.pipe(output);
  }

  return output;
}
