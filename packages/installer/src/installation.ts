import { execFile } from "node:child_process";
import { access, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { promisify } from "node:util";
import { createLogger } from "@plasticscm-setup/logger";
import { formatError } from "./errors.js";
import { configDefaultsPath, parseConfigDefaults } from "./generated-files.js";
import type { InstallationState, InstallPaths } from "./types.js";

const log = createLogger("installer:probe");
const execFileAsync = promisify(execFile);

/** Command-line client; its presence marks an installation. */
export function clientExecutablePath(paths: InstallPaths): string {
  return join(paths.installDir, "client", "cm");
}

/**
 * True when running as root. Platforms without user ids never qualify.
 */
export function isPrivileged(getuid: (() => number) | undefined): boolean {
  return typeof getuid === "function" && getuid() === 0;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

/** Version recorded by a previous run, if its defaults file points here. */
async function readRecordedVersion(paths: InstallPaths): Promise<string | undefined> {
  let text: string;
  try {
    text = await readFile(configDefaultsPath(paths), "utf-8");
  } catch (err) {
    if (isMissing(err)) return undefined;
    throw err;
  }
  const values = parseConfigDefaults(text);
  if (values.install_dir !== undefined && values.install_dir !== paths.installDir) {
    return undefined;
  }
  return values.version || undefined;
}

/** Ask the installed client for its version. */
export async function readClientVersion(cmPath: string): Promise<string | undefined> {
  try {
    const { stdout } = await execFileAsync(cmPath, ["version"], { timeout: 10_000 });
    return stdout.trim() || undefined;
  } catch (err) {
    log.warn(`Unable to query installed version via ${cmPath}: ${formatError(err)}`);
    return undefined;
  }
}

/**
 * Probe the installation directory. Any installation counts, whichever
 * channel it came from.
 */
export async function detectInstallation(paths: InstallPaths): Promise<InstallationState> {
  if (!(await isDirectory(paths.installDir))) {
    return { installed: false };
  }

  // A defaults file without the client is a leftover, not an installation.
  const cmPath = clientExecutablePath(paths);
  if (!(await pathExists(cmPath))) {
    return { installed: false };
  }

  const recorded = await readRecordedVersion(paths);
  if (recorded) {
    return { installed: true, version: recorded };
  }

  const version = await readClientVersion(cmPath);
  return version ? { installed: true, version } : { installed: true };
}
