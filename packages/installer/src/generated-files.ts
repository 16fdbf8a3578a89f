import { chmod, mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { createLogger } from "@plasticscm-setup/logger";
import { InstallError, formatError } from "./errors.js";
import type { GeneratedFiles, InstallPaths, ReleaseChannel } from "./types.js";

const log = createLogger("installer:files");

export const LAUNCHER_NAME = "plasticscm";
export const DESKTOP_ENTRY_NAME = "plasticscm.desktop";
export const CONFIG_FILE_NAME = "installer.conf";

/** GUI client inside the installation directory. */
export const GUI_EXECUTABLE = "client/gtkplastic";

export interface TemplateInput {
  paths: InstallPaths;
  version: string;
  channel: ReleaseChannel;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Quote one Exec argument for a desktop entry: double quotes with `"`, `` ` ``,
 * `$` and `\` backslash-escaped, then the string-value escape of `\`.
 */
function desktopExecQuote(value: string): string {
  const quoted = '"' + value.replace(/["`$\\]/g, "\\$&") + '"';
  return quoted.replace(/\\/g, "\\\\");
}

export function renderLauncher({ paths, version }: TemplateInput): string {
  return `#!/bin/sh
# Plastic SCM ${version} launcher, generated by plasticscm-setup.
PLASTICSCM_HOME=${shellQuote(paths.installDir)}
export PLASTICSCM_HOME
exec "$PLASTICSCM_HOME/${GUI_EXECUTABLE}" "$@"
`;
}

export function renderDesktopEntry({ paths, version, channel }: TemplateInput): string {
  return `[Desktop Entry]
Type=Application
Version=1.0
Name=Plastic SCM
Comment=Plastic SCM ${version} (${channel})
Exec=${desktopExecQuote(join(paths.binDir, LAUNCHER_NAME))} %F
Path=${join(paths.installDir, "client")}
Icon=${join(paths.installDir, "theme", "icon.png")}
Terminal=false
Categories=Development;RevisionControl;
`;
}

export function renderConfigDefaults({ paths, version, channel }: TemplateInput): string {
  return `# Written by plasticscm-setup. Read back on the next run to find the installed version.
version=${version}
channel=${channel}
install_dir=${paths.installDir}
`;
}

/** Parse the key=value lines of a generated defaults file. */
export function parseConfigDefaults(text: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;
    values[trimmed.slice(0, eq).trim()] = trimmed.slice(eq + 1).trim();
  }
  return values;
}

export function configDefaultsPath(paths: InstallPaths): string {
  return join(paths.configDir, CONFIG_FILE_NAME);
}

async function writeGenerated(path: string, content: string, mode?: number): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf-8");
    if (mode !== undefined) {
      await chmod(path, mode);
    }
  } catch (err) {
    throw new InstallError(
      "FilesystemError",
      `Unable to write ${path}: ${formatError(err)}`,
      { cause: err },
    );
  }
  log.debug(`Wrote ${path}`);
}

/**
 * Write the launcher script, desktop entry and defaults file.
 * Existing files are replaced.
 */
export async function writeGeneratedFiles(input: TemplateInput): Promise<GeneratedFiles> {
  const files: GeneratedFiles = {
    launcherPath: join(input.paths.binDir, LAUNCHER_NAME),
    desktopEntryPath: join(input.paths.desktopDir, DESKTOP_ENTRY_NAME),
    configPath: configDefaultsPath(input.paths),
  };

  await writeGenerated(files.launcherPath, renderLauncher(input), 0o755);
  await writeGenerated(files.desktopEntryPath, renderDesktopEntry(input), 0o644);
  await writeGenerated(files.configPath, renderConfigDefaults(input), 0o644);

  log.info(`Launcher installed at ${files.launcherPath}`);
  return files;
}
