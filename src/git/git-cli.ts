import { VersionControlError } from "../errors";
import { spawnRunner, type CommandRunner } from "../process";
import type { VersionControl } from "./types";

/**
 * VersionControl backed by the `git` executable in `repoPath`.
 */
export class GitCli implements VersionControl {
  constructor(
    private readonly repoPath: string,
    private readonly run: CommandRunner = spawnRunner,
  ) {}

  /**
   * Run a git command and return stdout, or null if it fails.
   */
  private git(args: string[]): string | null {
    const result = this.run("git", args, { cwd: this.repoPath });
    if (result.status !== 0) return null;
    return result.stdout.trim();
  }

  /**
   * Run a git command, throwing on failure.
   */
  private gitExec(args: string[], timeoutMs?: number): string {
    const result = this.run("git", args, {
      cwd: this.repoPath,
      timeoutMs,
      // never block on a credential prompt
      env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
    });
    if (result.timedOut) {
      throw new VersionControlError(
        `git ${args[0]} timed out after ${timeoutMs}ms`,
        args[0],
        result.stderr.trim(),
        true,
      );
    }
    if (result.status !== 0) {
      const stderr = result.stderr.trim() || result.error?.message || "";
      throw new VersionControlError(
        `git ${args[0]} failed: ${stderr}`,
        args[0],
        stderr,
      );
    }
    return result.stdout.trim();
  }

  isRepository(): boolean {
    return this.git(["rev-parse", "--is-inside-work-tree"]) === "true";
  }

  currentBranch(): string | null {
    // symbolic-ref also works on an unborn branch, rev-parse does not
    return this.git(["symbolic-ref", "--short", "-q", "HEAD"]) || null;
  }

  stage(paths: readonly string[] | "all"): void {
    if (paths === "all") {
      this.gitExec(["add", "-A"]);
      return;
    }
    if (paths.length === 0) return;
    this.gitExec(["add", "-A", "--", ...paths]);
  }

  hasStagedChanges(paths?: readonly string[]): boolean {
    const args = ["diff", "--cached", "--quiet"];
    if (paths && paths.length > 0) args.push("--", ...paths);

    const result = this.run("git", args, { cwd: this.repoPath });
    if (result.status === 0) return false;
    if (result.status === 1) return true;
    throw new VersionControlError(
      `git diff failed: ${result.stderr.trim()}`,
      "diff",
      result.stderr.trim(),
    );
  }

  commit(message: string, paths?: readonly string[]): boolean {
    if (!this.hasStagedChanges(paths)) return false;

    const args = ["commit", "-m", message];
    // --only keeps unrelated staged work out of the commit
    if (paths && paths.length > 0) args.push("--only", "--", ...paths);
    this.gitExec(args);
    return true;
  }

  push(remote: string, branch: string, timeoutMs: number): void {
    this.gitExec(["push", remote, branch], timeoutMs);
  }

  unpushedCount(remote: string, branch: string): number | null {
    const out = this.git(["rev-list", "--count", `${remote}/${branch}..HEAD`]);
    if (out === null) return null;
    const count = Number.parseInt(out, 10);
    return Number.isNaN(count) ? null : count;
  }
}
