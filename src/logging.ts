import { createConsola, LogLevels } from "consola";
import pc from "picocolors";
import type { CycleResult } from "./core/types";

export const colors = {
  bold: pc.bold,
  green: pc.green,
  yellow: pc.yellow,
  cyan: pc.cyan,
} as const;

export const logger = createConsola();

/** `--verbose` shows debug output, otherwise info and above */
export function setVerbose(verbose: boolean) {
  logger.level = verbose ? LogLevels.debug : LogLevels.info;
}

type Level = "info" | "success" | "warn" | "error" | "debug" | "log" | "start" | "fail";

// resolved per call so tests can spy on the logger methods
const at =
  (level: Level) =>
  (message: string, ...args: unknown[]) => {
    logger[level](message, ...args);
  };

export const info = at("info");
export const success = at("success");
export const warn = at("warn");
export const error = at("error");
export const debug = at("debug");
export const log = at("log");
export const start = at("start");
export const fail = at("fail");

/** Manifest text for piping, without consola's tags */
export function raw(message: string) {
  process.stdout.write(`${message}\n`);
}

/** One-line account of a cycle, e.g. `regenerated 12 entries, committed, pushed` */
export function describeCycle(result: CycleResult): string {
  const parts: string[] = [];
  if (result.regenerated) {
    parts.push(`regenerated ${result.entries ?? 0} entries`);
  } else {
    parts.push("no changes");
  }

  const { publish } = result;
  if (publish) {
    if (result.regenerated) {
      parts.push(publish.committed ? "committed" : "nothing to commit");
    }
    if (publish.pushed) parts.push("pushed");
    else if (publish.pushError) parts.push("push pending");
  }

  const failedHooks = result.hooks?.filter((h) => h.status === "failed").length ?? 0;
  if (failedHooks > 0) parts.push(`${failedHooks} hook(s) failed`);

  return parts.join(", ");
}
