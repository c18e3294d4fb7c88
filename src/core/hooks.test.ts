import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "node:fs";
import path from "node:path";
import os from "node:os";

import { runHooks } from "./hooks";
import type { HookSpec } from "./types";
import { createFile, recordingRunner } from "../test-utils";

const hook = (overrides: Partial<HookSpec> = {}): HookSpec => ({
  name: "scan",
  command: "python3",
  args: ["scan.py"],
  timeoutMs: 5000,
  ...overrides,
});

describe("runHooks", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "manifest-watch-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("runs each hook in the root with its timeout", () => {
    const runner = recordingRunner();

    const results = runHooks(tempDir, [hook(), hook({ name: "lint", command: "make", args: [] })], runner);

    expect(results).toEqual([
      { name: "scan", status: "ok", exitCode: 0 },
      { name: "lint", status: "ok", exitCode: 0 },
    ]);
    expect(runner.calls).toEqual([
      {
        command: "python3",
        args: ["scan.py"],
        options: { cwd: tempDir, timeoutMs: 5000 },
      },
      { command: "make", args: [], options: { cwd: tempDir, timeoutMs: 5000 } },
    ]);
  });

  it("skips hooks whose required path is missing", async () => {
    await createFile(tempDir, "present.py");
    const runner = recordingRunner();

    const results = runHooks(
      tempDir,
      [
        hook({ name: "missing", requires: "absent.py" }),
        hook({ name: "present", requires: "present.py" }),
      ],
      runner,
    );

    expect(results.map((r) => [r.name, r.status])).toEqual([
      ["missing", "skipped"],
      ["present", "ok"],
    ]);
    expect(runner.calls).toHaveLength(1);
  });

  it("reports failures and keeps running later hooks", () => {
    const runner = recordingRunner([
      { status: 2, stderr: "boom\n" },
      { status: null, timedOut: true },
    ]);

    const results = runHooks(
      tempDir,
      [hook({ name: "first" }), hook({ name: "second" }), hook({ name: "third" })],
      runner,
    );

    expect(results).toEqual([
      { name: "first", status: "failed", exitCode: 2, message: "boom" },
      {
        name: "second",
        status: "failed",
        exitCode: null,
        message: "timed out after 5000ms",
      },
      { name: "third", status: "ok", exitCode: 0 },
    ]);
  });
});
