import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import {
  CommitPublisher,
  formatTimestamp,
  renderCommitMessage,
  type PublisherOptions,
} from "./publisher";
import { VersionControlError } from "../errors";
import { logger } from "../logging";
import { MemoryVcs } from "../test-utils";

const fixedNow = () => new Date(2026, 0, 2, 3, 4, 5);

describe("CommitPublisher", () => {
  let vcs: MemoryVcs;

  const publisher = (overrides: Partial<PublisherOptions> = {}) =>
    new CommitPublisher({
      vcs,
      stage: "outputs",
      push: true,
      remote: "origin",
      message: "Regenerate manifest | {timestamp}",
      pushTimeoutMs: 1000,
      now: fixedNow,
      ...overrides,
    });

  beforeEach(() => {
    vcs = new MemoryVcs();
  });

  it("formats timestamps as local YYYY-MM-DD_HH:MM:SS", () => {
    expect(formatTimestamp(fixedNow())).toBe("2026-01-02_03:04:05");
    expect(renderCommitMessage("sync {timestamp} ({timestamp})", fixedNow())).toBe(
      "sync 2026-01-02_03:04:05 (2026-01-02_03:04:05)",
    );
  });

  it("commits and pushes when the staged paths changed", () => {
    vcs.write("manifest.txt", "a.py");

    const result = publisher().publish(["manifest.txt"]);

    expect(result).toEqual({
      committed: true,
      pushed: true,
      commitMessage: "Regenerate manifest | 2026-01-02_03:04:05",
    });
    expect(vcs.commits).toEqual(["Regenerate manifest | 2026-01-02_03:04:05"]);
    expect(vcs.pushes).toEqual([{ remote: "origin", branch: "main" }]);
  });

  it("is a no-op when the staged paths match HEAD", () => {
    vcs.write("manifest.txt", "a.py");
    const p = publisher();
    p.publish(["manifest.txt"]);

    const result = p.publish(["manifest.txt"]);

    expect(result).toEqual({ committed: false, pushed: false });
    expect(vcs.commits).toHaveLength(1);
    expect(vcs.pushes).toHaveLength(1);
  });

  it("stages only the given paths in outputs scope", () => {
    vcs.write("manifest.txt", "a.py");
    vcs.write("wip.py", "draft");

    publisher().publish(["manifest.txt"]);

    expect([...vcs.head.keys()]).toEqual(["manifest.txt"]);
  });

  it("stages everything in all scope", () => {
    vcs.write("manifest.txt", "a.py");
    vcs.write("wip.py", "draft");

    publisher({ stage: "all" }).publish(["manifest.txt"]);

    expect([...vcs.head.keys()].sort()).toEqual(["manifest.txt", "wip.py"]);
  });

  it("pushes to the configured branch instead of the current one", () => {
    vcs.write("manifest.txt", "a.py");

    publisher({ branch: "release", remote: "upstream" }).publish([
      "manifest.txt",
    ]);

    expect(vcs.pushes).toEqual([{ remote: "upstream", branch: "release" }]);
  });

  it("does not push when pushing is disabled", () => {
    vcs.write("manifest.txt", "a.py");

    const result = publisher({ push: false }).publish(["manifest.txt"]);

    expect(result.committed).toBe(true);
    expect(result.pushed).toBe(false);
    expect(vcs.pushes).toEqual([]);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("warns about push failures and retries only the push", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => undefined);
    vcs.write("manifest.txt", "a.py");
    vcs.failPushes = 1;
    const p = publisher();

    const failed = p.publish(["manifest.txt"]);

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      "Push failed, will retry next cycle: git push failed: Could not resolve host",
    );

    expect(failed.committed).toBe(true);
    expect(failed.pushed).toBe(false);
    expect(failed.pushError).toBe("git push failed: Could not resolve host");
    expect(p.hasPendingPush).toBe(true);

    const retried = p.retryPush();

    expect(retried).toEqual({ committed: false, pushed: true });
    expect(vcs.commits).toHaveLength(1);
    expect(vcs.pushes).toHaveLength(1);
    expect(p.hasPendingPush).toBe(false);
  });

  it("pushes a pending commit on the next publish even without changes", () => {
    vcs.write("manifest.txt", "a.py");
    vcs.failPushes = 1;
    const p = publisher();
    p.publish(["manifest.txt"]);

    const result = p.publish(["manifest.txt"]);

    expect(result).toEqual({ committed: false, pushed: true });
    expect(vcs.commits).toHaveLength(1);
  });

  it("picks up commits left unpushed by an earlier run", () => {
    vcs.commits.push("old");

    const p = publisher();

    expect(p.needsPush()).toBe(true);
    expect(p.retryPush().pushed).toBe(true);
  });

  it("reports a detached HEAD as a push failure", () => {
    vcs.write("manifest.txt", "a.py");
    vcs.branch = null;

    const result = publisher().publish(["manifest.txt"]);

    expect(result.committed).toBe(true);
    expect(result.pushError).toBe(
      "Cannot push from a detached HEAD without a configured branch",
    );
  });

  it("propagates staging failures", () => {
    expect(() => publisher().publish(["missing.txt"])).toThrow(
      VersionControlError,
    );
  });

  it("retryPush is a no-op with nothing pending", () => {
    expect(publisher().retryPush()).toEqual({ committed: false, pushed: false });
    expect(vcs.pushes).toEqual([]);
  });
});
