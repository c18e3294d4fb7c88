/**
 * The version-control operations manifest-watch depends on.
 * Implemented by the git CLI adapter and by in-memory fakes in tests.
 */
export interface VersionControl {
  isRepository(): boolean;
  /** Checked-out branch, or null on a detached HEAD */
  currentBranch(): string | null;
  /** Stage the given root-relative paths, or everything */
  stage(paths: readonly string[] | "all"): void;
  /** True if the index differs from HEAD (optionally only for `paths`) */
  hasStagedChanges(paths?: readonly string[]): boolean;
  /** Commit staged changes; returns false when there was nothing to commit */
  commit(message: string, paths?: readonly string[]): boolean;
  /** Throws VersionControlError on failure or timeout */
  push(remote: string, branch: string, timeoutMs: number): void;
  /** Commits on HEAD missing from remote/branch; null if unknown */
  unpushedCount(remote: string, branch: string): number | null;
}
