import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { createLogger } from "@plasticscm-setup/logger";
import { DEFAULT_DOWNLOAD_URL } from "./config.js";
import { downloadArchive } from "./downloader.js";
import { InstallError, formatError, toInstallError } from "./errors.js";
import { extractArchive } from "./extractor.js";
import { writeGeneratedFiles } from "./generated-files.js";
import { detectInstallation, isPrivileged } from "./installation.js";
import { ListingPageReleaseSource } from "./release.js";
import type {
  ArchiveComponent,
  DownloadProgress,
  InstallOutcome,
  InstallPaths,
  InstallResult,
  ReleaseChannel,
  ReleaseInfo,
  ReleaseSource,
  UpgradePolicy,
} from "./types.js";
import { compareVersions, isNewerVersion, isValidVersion } from "./version.js";

const log = createLogger("installer");

export interface InstallerOptions {
  paths: InstallPaths;
  /** Downloads site base; used when no releaseSource is given */
  downloadUrl?: string;
  releaseSource?: ReleaseSource;
  /** Also install the server bundle */
  includeServer?: boolean;
  /** Effective user id lookup, defaults to process.getuid */
  getuid?: () => number;
  onProgress?: (progress: DownloadProgress) => void;
}

/**
 * Installs or upgrades Plastic SCM from its published ZIP bundles.
 *
 * The run is strictly sequential and each step either completes or aborts
 * the whole run. Nothing extracted or written before a failure is rolled
 * back.
 */
export class Installer {
  private readonly paths: InstallPaths;
  private readonly releaseSource: ReleaseSource;
  private readonly includeServer: boolean;
  private readonly getuid: (() => number) | undefined;
  private readonly onProgress?: (progress: DownloadProgress) => void;

  constructor(options: InstallerOptions) {
    this.paths = options.paths;
    this.releaseSource =
      options.releaseSource ??
      new ListingPageReleaseSource(options.downloadUrl ?? DEFAULT_DOWNLOAD_URL);
    this.includeServer = options.includeServer ?? false;
    this.getuid = options.getuid ?? process.getuid;
    this.onProgress = options.onProgress;
  }

  /** Run every step. Never throws; failures come back in the result. */
  async run(channel: ReleaseChannel, upgradePolicy: UpgradePolicy): Promise<InstallResult> {
    try {
      const outcome = await this.install(channel, upgradePolicy);
      return { ok: true, outcome };
    } catch (err) {
      const error = toInstallError(err);
      log.error(`Installation failed (${error.kind}): ${error.message}`);
      return { ok: false, error };
    }
  }

  private async install(
    channel: ReleaseChannel,
    upgradePolicy: UpgradePolicy,
  ): Promise<InstallOutcome> {
    if (!isPrivileged(this.getuid)) {
      throw new InstallError(
        "InsufficientPrivileges",
        "This installer needs to be run with administrator privileges.",
      );
    }

    const state = await detectInstallation(this.paths);
    if (state.installed && upgradePolicy === "refuse-if-installed") {
      throw new InstallError(
        "AlreadyInstalled",
        `Plastic SCM is already installed at ${this.paths.installDir}` +
          (state.version ? ` (version ${state.version})` : ""),
      );
    }

    const release = await this.releaseSource.fetchLatestRelease(channel);
    const previousVersion = state.installed ? state.version : undefined;

    if (previousVersion && isValidVersion(previousVersion)) {
      if (compareVersions(previousVersion, release.version) === 0) {
        log.info(`Already up to date (${previousVersion})`);
        return { status: "up-to-date", version: release.version, previousVersion };
      }
      log.info(
        isNewerVersion(previousVersion, release.version)
          ? `Upgrading Plastic SCM: ${previousVersion} -> ${release.version}`
          : `Replacing Plastic SCM ${previousVersion} with ${channel} release ${release.version}`,
      );
    } else if (state.installed) {
      log.info(`Upgrading Plastic SCM to version ${release.version}`);
    } else {
      log.info(`Installing Plastic SCM ${release.version} for the first time`);
    }

    await this.downloadAndExtract(release);
    await writeGeneratedFiles({ paths: this.paths, version: release.version, channel });

    log.info("All done!");
    return {
      status: state.installed ? "upgraded" : "installed",
      version: release.version,
      ...(previousVersion ? { previousVersion } : {}),
    };
  }

  /** Download every bundle first, then extract, inside a per-run temp dir. */
  private async downloadAndExtract(release: ReleaseInfo): Promise<void> {
    const archives: Array<[ArchiveComponent, string]> = [["client", release.downloadUrl]];
    if (this.includeServer) {
      archives.push(["server", release.serverDownloadUrl]);
    }

    let workDir: string;
    try {
      await mkdir(this.paths.tmpDir, { recursive: true });
      workDir = await mkdtemp(join(this.paths.tmpDir, "download-"));
    } catch (err) {
      throw new InstallError(
        "FilesystemError",
        `Unable to create a download directory under ${this.paths.tmpDir}: ${formatError(err)}`,
        { cause: err },
      );
    }

    try {
      const downloaded: string[] = [];
      for (const [component, url] of archives) {
        const zipPath = join(workDir, `${component}.zip`);
        await downloadArchive(url, zipPath, this.onProgress);
        downloaded.push(zipPath);
      }
      for (const zipPath of downloaded) {
        await extractArchive(zipPath, this.paths.installDir);
      }
    } finally {
      await rm(workDir, { recursive: true, force: true }).catch((err: unknown) => {
        log.warn(`Unable to remove ${workDir}: ${formatError(err)}`);
      });
    }
  }
}
