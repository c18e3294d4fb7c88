import { existsSync } from "node:fs";
import { join } from "node:path";
import { warn, debug, start } from "../logging";
import { spawnRunner, type CommandRunner } from "../process";
import type { HookResult, HookSpec } from "./types";

/**
 * Runs the configured pre-regeneration commands in order, inside `root`.
 * A hook whose `requires` path is missing is skipped; a failing hook is
 * reported and the remaining hooks still run.
 */
export function runHooks(
  root: string,
  hooks: readonly HookSpec[],
  run: CommandRunner = spawnRunner,
): HookResult[] {
  const results: HookResult[] = [];

  for (const hook of hooks) {
    if (hook.requires && !existsSync(join(root, hook.requires))) {
      warn(`Hook ${hook.name} skipped: ${hook.requires} not found`);
      results.push({ name: hook.name, status: "skipped" });
      continue;
    }

    start(`Running hook ${hook.name}`);
    const result = run(hook.command, hook.args, {
      cwd: root,
      timeoutMs: hook.timeoutMs,
    });

    if (result.status === 0) {
      debug(result.stdout.trim());
      results.push({ name: hook.name, status: "ok", exitCode: 0 });
      continue;
    }

    const message = result.timedOut
      ? `timed out after ${hook.timeoutMs}ms`
      : result.error?.message || result.stderr.trim() || `exit code ${result.status}`;
    warn(`Hook ${hook.name} failed: ${message}`);
    results.push({
      name: hook.name,
      status: "failed",
      exitCode: result.status,
      message,
    });
  }

  return results;
}
