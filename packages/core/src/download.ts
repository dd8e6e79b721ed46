import { mkdir, open, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { ExternalServiceError, errorMessage } from "@wikindex/errors";
import { createChildLogger, redactUrl, type Logger } from "@wikindex/logger";

const PROGRESS_INTERVAL_MS = 5000;
const BYTES_PER_MB = 1024 * 1024;

export interface DownloadOptions {
  url: string;
  dest: string;
  /** Download again even if `dest` exists. */
  force?: boolean;
}

export interface DownloadDependencies {
  logger: Logger;
  fetch?: typeof fetch;
}

export interface DownloadResult {
  path: string;
  bytes: number;
  skipped: boolean;
}

function toMb(bytes: number): string {
  return (bytes / BYTES_PER_MB).toFixed(1);
}

async function existingSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

/**
 * Fetch the dump to `dest`. Data goes to a `.part` file that is renamed
 * once complete, so `dest` never holds a truncated archive.
 */
export async function downloadDump(
  options: DownloadOptions,
  deps: DownloadDependencies,
): Promise<DownloadResult> {
  const logger = createChildLogger(deps.logger, { stage: "download" });
  const fetchImpl = deps.fetch ?? fetch;

  const size = await existingSize(options.dest);
  if (size !== null && !options.force) {
    logger.info({ file: options.dest, sizeMb: toMb(size) }, "Dump already present, skipping download");
    return { path: options.dest, bytes: size, skipped: true };
  }

  await mkdir(dirname(options.dest), { recursive: true });
  logger.info({ url: redactUrl(options.url), file: options.dest }, "Downloading dump");

  let response: Response;
  try {
    response = await fetchImpl(options.url);
  } catch (err) {
    throw new ExternalServiceError(`Download failed: ${errorMessage(err)}`, "download", {
      cause: err,
    });
  }
  if (!response.ok) {
    throw new ExternalServiceError(
      `Download failed: ${response.status} ${response.statusText}`,
      "download",
      { details: { url: options.url } },
    );
  }
  const body = response.body;
  if (!body) {
    throw new ExternalServiceError("Download failed: response body is empty", "download");
  }

  const contentLength = Number(response.headers.get("content-length") ?? NaN);
  const totalBytes = Number.isFinite(contentLength) ? contentLength : undefined;
  const partPath = `${options.dest}.part`;
  const handle = await open(partPath, "w");
  const reader = body.getReader();
  let bytes = 0;
  let lastReport = Date.now();

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      await handle.write(value);
      bytes += value.byteLength;

      const now = Date.now();
      if (now - lastReport >= PROGRESS_INTERVAL_MS) {
        lastReport = now;
        logger.info(
          {
            downloadedMb: toMb(bytes),
            totalMb: totalBytes === undefined ? undefined : toMb(totalBytes),
          },
          "Download progress",
        );
      }
    }
  } catch (err) {
    await handle.close();
    await rm(partPath, { force: true });
    throw new ExternalServiceError(`Download interrupted: ${errorMessage(err)}`, "download", {
      cause: err,
    });
  }

  await handle.close();
  await rename(partPath, options.dest);
  logger.info({ file: options.dest, sizeMb: toMb(bytes) }, "Download complete");
  return { path: options.dest, bytes, skipped: false };
}
