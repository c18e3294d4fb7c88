import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { mkdir, utimes, writeFile } from "node:fs/promises";
import path from "node:path";
import { VersionControlError } from "./errors";
import type { VersionControl } from "./git/types";
import type { CommandResult, CommandRunner, RunOptions } from "./process";

/**
 * Writes a file (creating parent directories) and optionally pins its mtime.
 */
export async function createFile(
  root: string,
  relativePath: string,
  content = "",
  mtime?: Date,
): Promise<string> {
  const fullPath = path.join(root, relativePath);
  await mkdir(path.dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content);
  if (mtime) await utimes(fullPath, mtime, mtime);
  return fullPath;
}

/** Date `seconds` before `base` */
export function secondsBefore(base: Date, seconds: number): Date {
  return new Date(base.getTime() - seconds * 1000);
}

/**
 * In-memory VersionControl. Without a root the working tree is whatever
 * `write` puts in; with one, files are read from disk when staged.
 * Commits snapshot the staged content.
 */
export class MemoryVcs implements VersionControl {
  constructor(private readonly root?: string) {}

  readonly working = new Map<string, string>();
  readonly staged = new Map<string, string>();
  head = new Map<string, string>();
  readonly commits: string[] = [];
  readonly pushes: { remote: string; branch: string }[] = [];
  branch: string | null = "main";
  /** Number of upcoming push calls that fail */
  failPushes = 0;
  remoteCommits = 0;

  write(file: string, content: string) {
    this.working.set(file, content);
  }

  isRepository(): boolean {
    return true;
  }

  currentBranch(): string | null {
    return this.branch;
  }

  private read(file: string): string | undefined {
    if (!this.root) return this.working.get(file);
    const fullPath = path.join(this.root, file);
    return existsSync(fullPath) ? readFileSync(fullPath, "utf-8") : undefined;
  }

  private listWorking(): string[] {
    if (!this.root) return [...this.working.keys()];
    const root = this.root;
    return readdirSync(root, { recursive: true, encoding: "utf-8" })
      .map((p) => p.split(path.sep).join("/"))
      .filter((p) => !p.startsWith(".git"))
      .filter((p) => statSync(path.join(root, p)).isFile());
  }

  stage(paths: readonly string[] | "all"): void {
    const files = paths === "all" ? this.listWorking() : paths;
    for (const file of files) {
      const content = this.read(file);
      if (content === undefined) {
        throw new VersionControlError(`pathspec '${file}' did not match`, "add");
      }
      this.staged.set(file, content);
    }
  }

  private differs(paths?: readonly string[]): string[] {
    const files = paths ?? [...this.staged.keys()];
    return files.filter(
      (file) =>
        this.staged.has(file) && this.staged.get(file) !== this.head.get(file),
    );
  }

  hasStagedChanges(paths?: readonly string[]): boolean {
    return this.differs(paths).length > 0;
  }

  commit(message: string, paths?: readonly string[]): boolean {
    const changed = this.differs(paths);
    if (changed.length === 0) return false;
    const next = new Map(this.head);
    for (const file of changed) {
      const content = this.staged.get(file);
      if (content !== undefined) next.set(file, content);
    }
    this.head = next;
    this.commits.push(message);
    return true;
  }

  push(remote: string, branch: string, _timeoutMs: number): void {
    if (this.failPushes > 0) {
      this.failPushes -= 1;
      throw new VersionControlError(
        "git push failed: Could not resolve host",
        "push",
        "Could not resolve host",
      );
    }
    this.pushes.push({ remote, branch });
    this.remoteCommits = this.commits.length;
  }

  unpushedCount(_remote: string, _branch: string): number | null {
    return this.commits.length - this.remoteCommits;
  }
}

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

/**
 * CommandRunner that records calls and answers from a queue of results
 * (default: success with empty output).
 */
export function recordingRunner(
  responses: Partial<CommandResult>[] = [],
): CommandRunner & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner = (
    command: string,
    args: readonly string[],
    options: RunOptions,
  ): CommandResult => {
    calls.push({ command, args: [...args], options });
    const response = responses.shift() ?? {};
    return {
      status: 0,
      stdout: "",
      stderr: "",
      timedOut: false,
      ...response,
    };
  };
  return Object.assign(runner, { calls });
}
