export type InstallErrorKind =
  | "InsufficientPrivileges"
  | "AlreadyInstalled"
  | "ReleaseNotFound"
  | "DownloadFailed"
  | "ExtractionFailed"
  | "FilesystemError";

/** Terminal failure of an installer step. Nothing is retried. */
export class InstallError extends Error {
  readonly kind: InstallErrorKind;

  constructor(kind: InstallErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InstallError";
    this.kind = kind;
  }
}

/** Process exit status per error kind. 0 is success. */
export const EXIT_CODES = {
  InsufficientPrivileges: 77,
  AlreadyInstalled: 3,
  ReleaseNotFound: 4,
  DownloadFailed: 5,
  ExtractionFailed: 6,
  FilesystemError: 7,
} as const satisfies Record<InstallErrorKind, number>;

export function exitCodeFor(kind: InstallErrorKind): number {
  return EXIT_CODES[kind];
}

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const FILESYSTEM_ERROR_CODES: ReadonlySet<string> = new Set([
  "EACCES",
  "ENOENT",
  "EPERM",
  "ENOSPC",
  "EDQUOT",
  "EROFS",
  "EISDIR",
  "ENOTDIR",
  "EEXIST",
  "EMFILE",
  "EBUSY",
]);

/** True for errno failures caused by permissions, space or path layout. */
export function isFilesystemError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  const { code } = err;
  return typeof code === "string" && FILESYSTEM_ERROR_CODES.has(code);
}

export function toInstallError(err: unknown): InstallError {
  if (err instanceof InstallError) return err;
  return new InstallError("FilesystemError", formatError(err), { cause: err });
}
