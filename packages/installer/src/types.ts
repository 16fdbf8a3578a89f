import type { InstallError } from "./errors.js";

/** A named release track with its own listing of versions. */
export type ReleaseChannel = "stable" | "labs";

export type UpgradePolicy = "allow-upgrade" | "refuse-if-installed";

/** Bundles published for each release. */
export type ArchiveComponent = "client" | "server";

/** The newest release of a channel, as found on the listing page. */
export interface ReleaseInfo {
  channel: ReleaseChannel;
  /** Dotted version identifier, e.g. "11.0.16.8512" */
  version: string;
  /** Client ZIP bundle */
  downloadUrl: string;
  /** Server ZIP bundle of the same version */
  serverDownloadUrl: string;
}

/** Locates the newest release of a channel. */
export interface ReleaseSource {
  fetchLatestRelease(channel: ReleaseChannel): Promise<ReleaseInfo>;
}

/** What the installer finds on disk before doing anything. */
export type InstallationState =
  | { installed: false }
  | { installed: true; version?: string };

/** Fixed filesystem locations the installer reads and writes. */
export interface InstallPaths {
  /** Extracted application tree */
  installDir: string;
  /** Launcher script destination */
  binDir: string;
  /** Desktop/menu entry destination */
  desktopDir: string;
  /** Generated defaults file destination */
  configDir: string;
  /** Parent of the per-run download directory */
  tmpDir: string;
}

/** Download progress event data */
export interface DownloadProgress {
  url: string;
  /** Bytes downloaded so far */
  downloaded: number;
  /** Total size from Content-Length, when the server sent one */
  total?: number;
  /** Progress percentage (0-100), when the total is known */
  percent?: number;
}

export interface DownloadResult {
  filePath: string;
  size: number;
}

export interface GeneratedFiles {
  launcherPath: string;
  desktopEntryPath: string;
  configPath: string;
}

export type InstallStatus = "installed" | "upgraded" | "up-to-date";

export interface InstallOutcome {
  status: InstallStatus;
  version: string;
  /** Version found on disk before the run, when there was one */
  previousVersion?: string;
}

export type InstallResult =
  | { ok: true; outcome: InstallOutcome }
  | { ok: false; error: InstallError };
