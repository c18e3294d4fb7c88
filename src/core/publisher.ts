import { VersionControlError, errorMessage } from "../errors";
import type { VersionControl } from "../git/types";
import { debug, info, success, warn } from "../logging";
import type { PublishResult, StageScope } from "./types";

export interface PublisherOptions {
  vcs: VersionControl;
  stage: StageScope;
  /** Disable to commit locally only */
  push: boolean;
  remote: string;
  /** Defaults to the checked-out branch */
  branch?: string;
  /** Commit message; `{timestamp}` is replaced */
  message: string;
  pushTimeoutMs: number;
  now?: () => Date;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** Local time as `YYYY-MM-DD_HH:MM:SS` */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function renderCommitMessage(template: string, date: Date): string {
  return template.split("{timestamp}").join(formatTimestamp(date));
}

/**
 * Stages, commits (only when the staged set differs from HEAD) and pushes.
 *
 * Push failures are logged and remembered rather than thrown; a later
 * `publish` or `retryPush` pushes the existing commit again.
 */
export class CommitPublisher {
  private pendingPush = false;
  private checkedUnpushed = false;

  constructor(private readonly options: PublisherOptions) {}

  /** True while a local commit is waiting to be pushed */
  get hasPendingPush(): boolean {
    return this.pendingPush;
  }

  /** Like `hasPendingPush`, but also asks git about commits left by a previous run */
  needsPush(): boolean {
    this.checkUnpushed();
    return this.pendingPush;
  }

  private resolveBranch(): string {
    const branch = this.options.branch ?? this.options.vcs.currentBranch();
    if (!branch) {
      throw new VersionControlError(
        "Cannot push from a detached HEAD without a configured branch",
        "push",
      );
    }
    return branch;
  }

  /** Picks up commits a previous run failed to push */
  private checkUnpushed(): void {
    if (this.checkedUnpushed || !this.options.push) return;
    this.checkedUnpushed = true;

    const branch = this.options.branch ?? this.options.vcs.currentBranch();
    if (!branch) return;
    const count = this.options.vcs.unpushedCount(this.options.remote, branch);
    if (count !== null && count > 0) {
      debug(`${count} unpushed commit(s) on ${branch}`);
      this.pendingPush = true;
    }
  }

  /**
   * Stage `paths` (root-relative) and create at most one commit.
   * With stage scope "all" every change in the working tree is staged.
   */
  publish(paths: readonly string[]): PublishResult {
    const { vcs, stage } = this.options;
    this.checkUnpushed();

    const message = renderCommitMessage(
      this.options.message,
      (this.options.now ?? (() => new Date()))(),
    );

    let committed: boolean;
    if (stage === "all") {
      vcs.stage("all");
      committed = vcs.commit(message);
    } else {
      vcs.stage(paths);
      committed = vcs.commit(message, paths);
    }

    if (committed) {
      success(`Committed: ${message}`);
      if (this.options.push) this.pendingPush = true;
    } else {
      debug("Nothing to commit");
    }

    const result: PublishResult = { committed, pushed: false };
    if (committed) result.commitMessage = message;

    if (this.pendingPush) {
      Object.assign(result, this.tryPush());
    }
    return result;
  }

  /** Push an earlier commit whose push failed; no-op when nothing is pending */
  retryPush(): PublishResult {
    this.checkUnpushed();
    if (!this.pendingPush) return { committed: false, pushed: false };
    info("Retrying push of unpublished commit...");
    return { committed: false, ...this.tryPush() };
  }

  private tryPush(): Pick<PublishResult, "pushed" | "pushError"> {
    const { vcs, remote, pushTimeoutMs } = this.options;
    try {
      const branch = this.resolveBranch();
      vcs.push(remote, branch, pushTimeoutMs);
      this.pendingPush = false;
      success(`Pushed to ${remote}/${branch}`);
      return { pushed: true };
    } catch (err) {
      if (!(err instanceof VersionControlError)) throw err;
      const message = errorMessage(err);
      warn(`Push failed, will retry next cycle: ${message}`);
      return { pushed: false, pushError: message };
    }
  }
}
