import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { promises as fs } from "node:fs";
import path from "node:path";
import os from "node:os";

import { loadConfig } from "./config";
import { createContext, type CycleContext } from "./cycle";
import { WatchLoop, backoffDelay, type WatchOptions } from "./watcher";
import { FilesystemError } from "../errors";
import { logger } from "../logging";
import { MemoryVcs, createFile, secondsBefore } from "../test-utils";

const now = new Date(2026, 0, 2, 3, 4, 5);

describe("backoffDelay", () => {
  it("doubles per failure up to the cap", () => {
    expect(backoffDelay(1000, 0, 5000)).toBe(1000);
    expect(backoffDelay(1000, 1, 5000)).toBe(2000);
    expect(backoffDelay(1000, 2, 5000)).toBe(4000);
    expect(backoffDelay(1000, 3, 5000)).toBe(5000);
    expect(backoffDelay(1000, 10, 5000)).toBe(5000);
  });
});

describe("WatchLoop", () => {
  let tempDir: string;
  let vcs: MemoryVcs;
  let ctx: CycleContext;

  const loop = (overrides: Partial<WatchOptions> = {}) =>
    new WatchLoop(ctx, {
      intervalMs: 1000,
      maxBackoffMs: 5000,
      maxConsecutiveFailures: 2,
      ...overrides,
    });

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "manifest-watch-"));
    vcs = new MemoryVcs(tempDir);
    await createFile(tempDir, "a.py", "print(1)", secondsBefore(now, 10));
    ctx = createContext(loadConfig({ root: tempDir, env: {} }), {
      vcs,
      now: () => now,
    });
    vi.spyOn(logger, "error").mockImplementation(() => undefined);
    vi.spyOn(logger, "warn").mockImplementation(() => undefined);
    vi.spyOn(logger, "info").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("counts push failures and backs off", async () => {
    vcs.failPushes = 3;
    const w = loop();

    const first = await w.tick();
    expect(first.ok).toBe(false);
    expect(w.consecutiveFailures).toBe(1);
    expect(w.nextDelay()).toBe(2000);

    await w.tick();
    await w.tick();
    expect(w.consecutiveFailures).toBe(3);
    expect(w.nextDelay()).toBe(5000);
    expect(vcs.commits).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Push failed, will retry next cycle: git push failed: Could not resolve host",
    );
  });

  it("alerts once per failure streak and resets on success", async () => {
    vcs.failPushes = 3;
    const w = loop();

    await w.tick();
    await w.tick();
    await w.tick();

    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      "2 consecutive failed cycles; last error: git push failed: Could not resolve host",
    );

    const recovered = await w.tick();

    expect(recovered.ok).toBe(true);
    expect(w.consecutiveFailures).toBe(0);
    expect(w.nextDelay()).toBe(1000);
    expect(vcs.pushes).toHaveLength(1);
    expect(logger.info).toHaveBeenCalledWith("Recovered after failures");
  });

  it("survives cycle errors", async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
    const w = loop();

    const outcome = await w.tick();

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(FilesystemError);
    }
    expect(w.consecutiveFailures).toBe(1);
  });

  it("runs until aborted, sleeping the backoff delay between cycles", async () => {
    vcs.failPushes = 2;
    const controller = new AbortController();
    const delays: number[] = [];
    const w = loop({
      signal: controller.signal,
      sleep: async (ms) => {
        delays.push(ms);
        if (delays.length === 3) controller.abort();
      },
    });

    await w.run();

    expect(delays).toEqual([2000, 4000, 1000]);
    expect(vcs.commits).toHaveLength(1);
    expect(vcs.pushes).toHaveLength(1);
  });

  it("does not start a cycle when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await loop({ signal: controller.signal }).run();

    expect(vcs.commits).toEqual([]);
  });
});
