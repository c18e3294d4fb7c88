import { spawnSync } from "node:child_process";

export interface CommandResult {
  /** Exit code, or null when the process was killed or never started */
  status: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Spawn failure (command not found, timeout, ...) */
  error?: Error;
}

export interface RunOptions {
  cwd: string;
  timeoutMs?: number;
  input?: string;
  env?: NodeJS.ProcessEnv;
}

/** Synchronous command execution, swappable in tests */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: RunOptions,
) => CommandResult;

export const spawnRunner: CommandRunner = (command, args, options) => {
  const result = spawnSync(command, [...args], {
    cwd: options.cwd,
    encoding: "utf-8",
    stdio: ["pipe", "pipe", "pipe"],
    input: options.input,
    timeout: options.timeoutMs,
    env: options.env,
  });
  const code =
    result.error && "code" in result.error ? result.error.code : undefined;
  return {
    status: result.status,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    timedOut: code === "ETIMEDOUT",
    error: result.error,
  };
};
