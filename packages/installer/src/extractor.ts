import { mkdir } from "node:fs/promises";
import AdmZip from "adm-zip";
import { createLogger } from "@plasticscm-setup/logger";
import { InstallError, formatError, isFilesystemError } from "./errors.js";

const log = createLogger("installer:extract");

/**
 * Unpack a ZIP archive into destDir, overwriting existing files and keeping
 * the archived permission bits. Returns the archive's entry names.
 *
 * @throws ExtractionFailed for malformed, truncated or empty archives,
 *   FilesystemError when the destination cannot be written.
 */
export async function extractArchive(zipPath: string, destDir: string): Promise<string[]> {
  let zip: AdmZip;
  let entries: AdmZip.IZipEntry[];
  try {
    zip = new AdmZip(zipPath);
    entries = zip.getEntries();
  } catch (err) {
    throw new InstallError(
      "ExtractionFailed",
      `Unable to read archive ${zipPath}: ${formatError(err)}`,
      { cause: err },
    );
  }

  if (entries.length === 0) {
    throw new InstallError("ExtractionFailed", `Archive ${zipPath} is empty`);
  }

  try {
    await mkdir(destDir, { recursive: true });
  } catch (err) {
    throw new InstallError(
      "FilesystemError",
      `Unable to create ${destDir}: ${formatError(err)}`,
      { cause: err },
    );
  }

  log.info(`Extracting ${entries.length} entries from ${zipPath} to ${destDir}`);
  try {
    zip.extractAllTo(destDir, true, true);
  } catch (err) {
    throw new InstallError(
      isFilesystemError(err) ? "FilesystemError" : "ExtractionFailed",
      `Unable to extract ${zipPath} to ${destDir}: ${formatError(err)}`,
      { cause: err },
    );
  }

  return entries.map((entry) => entry.entryName);
}
