import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ExternalServiceError } from "@wikindex/errors";
import { createSilentLogger } from "@wikindex/logger";
import { downloadDump } from "./download.js";

const URL = "https://dumps.example.org/testwiki-latest-pages-articles.xml.bz2";

describe("downloadDump", () => {
  let dir: string;
  let dest: string;
  const logger = createSilentLogger();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "wikindex-download-"));
    dest = join(dir, "dumps", "testwiki.xml.bz2");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("streams the response body to the destination", async () => {
    const fetch = vi.fn(async () => new Response("dump-bytes"));

    const result = await downloadDump({ url: URL, dest }, { logger, fetch });

    expect(result).toEqual({ path: dest, bytes: 10, skipped: false });
    expect(await readFile(dest, "utf8")).toBe("dump-bytes");
    expect(fetch).toHaveBeenCalledWith(URL);
    await expect(access(`${dest}.part`)).rejects.toThrow();
  });

  it("skips an existing file unless forced", async () => {
    await downloadDump({ url: URL, dest }, { logger, fetch: async () => new Response("old") });
    const fetch = vi.fn(async () => new Response("newer"));

    const skipped = await downloadDump({ url: URL, dest }, { logger, fetch });
    expect(skipped).toEqual({ path: dest, bytes: 3, skipped: true });
    expect(fetch).not.toHaveBeenCalled();

    const forced = await downloadDump({ url: URL, dest, force: true }, { logger, fetch });
    expect(forced.skipped).toBe(false);
    expect(await readFile(dest, "utf8")).toBe("newer");
  });

  it("raises ExternalServiceError on an HTTP error and writes nothing", async () => {
    const fetch = async () => new Response("gone", { status: 404, statusText: "Not Found" });

    const err = await downloadDump({ url: URL, dest }, { logger, fetch }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExternalServiceError);
    if (err instanceof ExternalServiceError) {
      expect(err.message).toBe("Download failed: 404 Not Found");
      expect(err.service).toBe("download");
    }
    await expect(access(dest)).rejects.toThrow();
  });

  it("wraps network failures", async () => {
    const fetch = async () => Promise.reject(new TypeError("fetch failed"));

    await expect(downloadDump({ url: URL, dest }, { logger, fetch })).rejects.toThrow(
      "Download failed: fetch failed",
    );
  });

  it("keeps an existing destination when a forced download fails", async () => {
    await writeFile(join(dir, "keep.bz2"), "original");
    const keep = join(dir, "keep.bz2");
    const fetch = async () => new Response(null, { status: 500, statusText: "Server Error" });

    await expect(downloadDump({ url: URL, dest: keep, force: true }, { logger, fetch })).rejects.toThrow(
      ExternalServiceError,
    );
    expect(await readFile(keep, "utf8")).toBe("original");
  });
});
