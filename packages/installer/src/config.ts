import { tmpdir } from "node:os";
import { isAbsolute, join } from "node:path";
import { z } from "zod";
import type { InstallPaths } from "./types.js";

export const DEFAULT_DOWNLOAD_URL = "https://www.plasticscm.com/download";

export const DEFAULT_INSTALL_PATHS: InstallPaths = {
  installDir: "/opt/plasticscm5",
  binDir: "/usr/local/bin",
  desktopDir: "/usr/share/applications",
  configDir: "/etc/plasticscm",
  tmpDir: join(tmpdir(), "plasticupdater"),
};

function blankAsUnset<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    schema.optional(),
  );
}

const absolutePath = z
  .string()
  .trim()
  .refine((value) => isAbsolute(value), { message: "must be an absolute path" });

const configSchema = z.object({
  PLASTICSCM_INSTALL_DIR: blankAsUnset(absolutePath),
  PLASTICSCM_BIN_DIR: blankAsUnset(absolutePath),
  PLASTICSCM_DESKTOP_DIR: blankAsUnset(absolutePath),
  PLASTICSCM_CONFIG_DIR: blankAsUnset(absolutePath),
  PLASTICSCM_TMP_DIR: blankAsUnset(absolutePath),
  PLASTICSCM_DOWNLOAD_URL: blankAsUnset(z.string().trim().url()),
});

export interface InstallerConfig {
  paths: InstallPaths;
  /** Base of the downloads site; listing pages and archive URLs hang off it */
  downloadUrl: string;
}

/**
 * Build the installer configuration from environment overrides.
 * Unset or blank variables keep their defaults. Throws on invalid values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): InstallerConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    paths: {
      installDir: parsed.PLASTICSCM_INSTALL_DIR ?? DEFAULT_INSTALL_PATHS.installDir,
      binDir: parsed.PLASTICSCM_BIN_DIR ?? DEFAULT_INSTALL_PATHS.binDir,
      desktopDir: parsed.PLASTICSCM_DESKTOP_DIR ?? DEFAULT_INSTALL_PATHS.desktopDir,
      configDir: parsed.PLASTICSCM_CONFIG_DIR ?? DEFAULT_INSTALL_PATHS.configDir,
      tmpDir: parsed.PLASTICSCM_TMP_DIR ?? DEFAULT_INSTALL_PATHS.tmpDir,
    },
    downloadUrl: (parsed.PLASTICSCM_DOWNLOAD_URL ?? DEFAULT_DOWNLOAD_URL).replace(/\/+$/, ""),
  };
}
