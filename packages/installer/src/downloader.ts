import { createWriteStream } from "node:fs";
import { unlink } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { Readable } from "node:stream";
import { createLogger } from "@plasticscm-setup/logger";
import { InstallError, formatError, isFilesystemError } from "./errors.js";
import type { DownloadProgress, DownloadResult } from "./types.js";

const log = createLogger("installer:download");

/**
 * Download a file from a URL to a local path with progress reporting.
 * Single attempt: network errors and non-ok responses throw DownloadFailed,
 * write errors throw FilesystemError. A partial file is removed.
 */
export async function downloadArchive(
  url: string,
  destPath: string,
  onProgress?: (progress: DownloadProgress) => void,
  signal?: AbortSignal,
): Promise<DownloadResult> {
  log.info(`Downloading '${url}'...`);

  let response: Response;
  try {
    response = await fetch(url, { signal, redirect: "follow" });
  } catch (err) {
    throw new InstallError(
      "DownloadFailed",
      `Unable to download from ${url}: ${formatError(err)}`,
      { cause: err },
    );
  }

  if (!response.ok) {
    throw new InstallError(
      "DownloadFailed",
      `Download failed: HTTP ${response.status} ${response.statusText}`,
    );
  }

  if (!response.body) {
    throw new InstallError("DownloadFailed", "Download failed: no response body");
  }

  const lengthHeader = Number(response.headers.get("content-length"));
  const total = Number.isFinite(lengthHeader) && lengthHeader > 0 ? lengthHeader : undefined;
  let downloaded = 0;

  const reader = response.body.getReader();
  const nodeStream = new Readable({
    async read() {
      try {
        const { done, value } = await reader.read();
        if (done) {
          this.push(null);
          return;
        }
        downloaded += value.byteLength;
        onProgress?.({
          url,
          downloaded,
          total,
          percent: total ? Math.min(100, Math.round((downloaded / total) * 100)) : undefined,
        });
        this.push(Buffer.from(value));
      } catch (err) {
        this.destroy(err instanceof Error ? err : new Error(String(err)));
      }
    },
  });

  const writeStream = createWriteStream(destPath);

  try {
    await pipeline(nodeStream, writeStream);
  } catch (err) {
    await reader.cancel().catch((cancelErr: unknown) => {
      log.debug(`Could not cancel response body from ${url}: ${formatError(cancelErr)}`);
    });
    await unlink(destPath).catch((cleanupErr: unknown) => {
      log.debug(`Could not remove partial download ${destPath}: ${formatError(cleanupErr)}`);
    });
    if (isFilesystemError(err)) {
      throw new InstallError(
        "FilesystemError",
        `Unable to write ${destPath}: ${formatError(err)}`,
        { cause: err },
      );
    }
    throw new InstallError(
      "DownloadFailed",
      `Unable to download from ${url}: ${formatError(err)}`,
      { cause: err },
    );
  }

  log.info(`Downloaded ${downloaded} bytes to ${destPath}`);
  return { filePath: destPath, size: downloaded };
}
