import { watch, type FSWatcher } from "node:fs";
import { errorMessage, isRecoverable } from "../errors";
import { colors, describeCycle, error, info, warn } from "../logging";
import { runCycle, type CycleContext } from "./cycle";
import type { CycleResult } from "./types";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface WatchOptions {
  intervalMs: number;
  maxBackoffMs: number;
  /** Consecutive failed cycles before an error-level alert */
  maxConsecutiveFailures: number;
  /** Aborting stops the loop after the in-flight cycle */
  signal?: AbortSignal;
  /** Wake early on filesystem notifications */
  notify?: boolean;
  sleep?: Sleep;
}

export type CycleOutcome =
  | { ok: true; result: CycleResult }
  | { ok: false; error: unknown; result?: CycleResult };

/** `intervalMs * 2^failures`, capped at `maxMs` */
export function backoffDelay(
  intervalMs: number,
  failures: number,
  maxMs: number,
): number {
  if (failures <= 0) return intervalMs;
  return Math.min(intervalMs * 2 ** failures, maxMs);
}

/**
 * Polling loop around `runCycle`.
 *
 * Cycle errors never end the loop: they are logged and the next cycle is
 * delayed with exponential backoff. Aborting the signal interrupts the
 * sleep; a cycle already running is allowed to finish.
 */
export class WatchLoop {
  private failures = 0;
  private alerted = false;
  private wake: (() => void) | null = null;

  constructor(
    private readonly ctx: CycleContext,
    private readonly options: WatchOptions,
  ) {}

  get consecutiveFailures(): number {
    return this.failures;
  }

  nextDelay(): number {
    return backoffDelay(
      this.options.intervalMs,
      this.failures,
      this.options.maxBackoffMs,
    );
  }

  /** Runs one cycle and updates the failure streak */
  async tick(): Promise<CycleOutcome> {
    let outcome: CycleOutcome;
    try {
      const result = await runCycle(this.ctx);
      if (result.regenerated || result.publish) {
        info(`Cycle finished: ${describeCycle(result)}`);
      }
      outcome = result.publish?.pushError
        ? { ok: false, error: result.publish.pushError, result }
        : { ok: true, result };
    } catch (err) {
      if (isRecoverable(err)) {
        warn(`Cycle failed: ${errorMessage(err)}`);
      } else {
        error("Unexpected error during cycle:", err);
      }
      outcome = { ok: false, error: err };
    }

    if (outcome.ok) {
      if (this.failures > 0) info("Recovered after failures");
      this.failures = 0;
      this.alerted = false;
    } else {
      this.failures += 1;
      if (
        this.failures >= this.options.maxConsecutiveFailures &&
        !this.alerted
      ) {
        this.alerted = true;
        error(
          `${this.failures} consecutive failed cycles; last error: ${errorMessage(outcome.error)}`,
        );
      }
    }
    return outcome;
  }

  async run(): Promise<void> {
    const { signal } = this.options;
    const watcher = this.options.notify ? this.startNotifier() : null;

    info(
      `Watching ${colors.cyan(this.ctx.config.root)} every ${this.options.intervalMs}ms`,
    );

    try {
      while (!signal?.aborted) {
        await this.tick();
        if (signal?.aborted) break;
        await this.sleep(this.nextDelay());
      }
    } finally {
      watcher?.close();
    }
    info("Watcher stopped");
  }

  private sleep(ms: number): Promise<void> {
    if (this.options.sleep) return this.options.sleep(ms, this.options.signal);

    const { signal } = this.options;
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", done);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal?.addEventListener("abort", done, { once: true });
      this.wake = done;
    });
  }

  private startNotifier(): FSWatcher | null {
    try {
      const watcher = watch(
        this.ctx.config.root,
        { recursive: true, signal: this.options.signal },
        () => {
          // notifications only shorten the normal interval, never a backoff
          if (this.failures === 0) this.wake?.();
        },
      );
      watcher.on("error", (err) => {
        warn(`Filesystem notifications stopped: ${errorMessage(err)}`);
        watcher.close();
      });
      return watcher;
    } catch (err) {
      warn(`Filesystem notifications unavailable, polling only: ${errorMessage(err)}`);
      return null;
    }
  }
}
