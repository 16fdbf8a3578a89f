export type {
  ReleaseChannel,
  UpgradePolicy,
  ArchiveComponent,
  ReleaseInfo,
  ReleaseSource,
  InstallationState,
  InstallPaths,
  DownloadProgress,
  DownloadResult,
  GeneratedFiles,
  InstallStatus,
  InstallOutcome,
  InstallResult,
} from "./types.js";
export type { InstallErrorKind } from "./errors.js";
export {
  InstallError,
  EXIT_CODES,
  exitCodeFor,
  formatError,
  isFilesystemError,
  toInstallError,
} from "./errors.js";
export type { InstallerConfig } from "./config.js";
export { DEFAULT_DOWNLOAD_URL, DEFAULT_INSTALL_PATHS, loadConfig } from "./config.js";
export { parseVersion, isValidVersion, compareVersions, isNewerVersion } from "./version.js";
export {
  LISTING_PATHS,
  listingUrl,
  buildArchiveUrl,
  extractChannelSection,
  parseLatestRelease,
  fetchListingPage,
  fetchLatestRelease,
  ListingPageReleaseSource,
} from "./release.js";
export { downloadArchive } from "./downloader.js";
export { extractArchive } from "./extractor.js";
export type { TemplateInput } from "./generated-files.js";
export {
  LAUNCHER_NAME,
  DESKTOP_ENTRY_NAME,
  CONFIG_FILE_NAME,
  GUI_EXECUTABLE,
  renderLauncher,
  renderDesktopEntry,
  renderConfigDefaults,
  parseConfigDefaults,
  writeGeneratedFiles,
} from "./generated-files.js";
export {
  clientExecutablePath,
  isPrivileged,
  readClientVersion,
  detectInstallation,
} from "./installation.js";
export type { InstallerOptions } from "./installer.js";
export { Installer } from "./installer.js";
