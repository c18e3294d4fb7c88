/**
 * Error taxonomy for manifest-watch.
 *
 * Filesystem and version-control errors are recoverable inside the watch
 * loop. Configuration errors are fatal at startup.
 */

export type ErrorCode = "FS_ERROR" | "VCS_ERROR" | "CONFIG_ERROR";

export class ManifestWatchError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ManifestWatchError";
  }
}

export class FilesystemError extends ManifestWatchError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, "FS_ERROR", options);
    this.name = "FilesystemError";
  }
}

export class VersionControlError extends ManifestWatchError {
  constructor(
    message: string,
    /** git sub-command that failed (add, commit, push, ...) */
    public readonly operation: string,
    public readonly stderr: string = "",
    /** True when the command was killed by its timeout */
    public readonly timedOut: boolean = false,
  ) {
    super(message, "VCS_ERROR");
    this.name = "VersionControlError";
  }
}

export class ConfigurationError extends ManifestWatchError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigurationError";
  }
}

/** Errors the watch loop logs and retries on the next cycle */
export function isRecoverable(err: unknown): boolean {
  return err instanceof FilesystemError || err instanceof VersionControlError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
