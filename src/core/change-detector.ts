import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import ignore, { type Ignore } from "ignore";
import { FilesystemError } from "../errors";
import { walkFiles, type WalkOptions } from "../tree/walk";
import type { ChangeState, DetectionResult } from "./types";

export interface ChangeDetectorOptions extends WalkOptions {
  root: string;
  /** Watermark file; its mtime is the last successful regeneration */
  marker: string;
  /** Gitignore-style patterns selecting the watched files */
  patterns: readonly string[];
}

/**
 * Compares file mtimes under the root against the marker's mtime.
 *
 * DIRTY iff a watched file is strictly newer than the marker, or the marker
 * is missing. The marker's mtime is the only persisted state.
 */
export class ChangeDetector {
  private readonly matcher: Ignore;
  private current: ChangeState = "CLEAN";

  constructor(private readonly options: ChangeDetectorOptions) {
    this.matcher = ignore().add([...options.patterns]);
  }

  /** State from the most recent `detect()` or `markClean()` */
  get state(): ChangeState {
    return this.current;
  }

  isWatched(relativePath: string): boolean {
    return ignore.isPathValid(relativePath) && this.matcher.ignores(relativePath);
  }

  async markerMtime(): Promise<number | null> {
    const stat = await fs.stat(this.options.marker).catch(() => null);
    return stat ? stat.mtimeMs : null;
  }

  async detect(): Promise<DetectionResult> {
    const { root, marker, exclude, ignoreFile, skip = [] } = this.options;

    const markerMtimeMs = await this.markerMtime();
    const files = await walkFiles(root, {
      exclude,
      ignoreFile,
      skip: [...skip, marker],
    });

    const changed = files
      .filter((file) => this.isWatched(file.path))
      .filter((file) => markerMtimeMs === null || file.mtimeMs > markerMtimeMs)
      .map((file) => file.path);

    const state: ChangeState =
      markerMtimeMs === null || changed.length > 0 ? "DIRTY" : "CLEAN";
    this.current = state;

    return { state, changed, markerMtimeMs };
  }

  /**
   * Moves the watermark to `at` (creating the marker if needed).
   * Pass the time the cycle started so edits made during it stay DIRTY.
   */
  async markClean(at: Date = new Date()): Promise<void> {
    const { marker } = this.options;
    try {
      const exists = await fs.stat(marker).then(
        () => true,
        () => false,
      );
      if (!exists) {
        await fs.mkdir(dirname(marker), { recursive: true });
        await fs.writeFile(marker, "");
      }
      await fs.utimes(marker, at, at);
    } catch (err) {
      throw new FilesystemError(`Cannot update marker ${marker}`, marker, {
        cause: err,
      });
    }
    this.current = "CLEAN";
  }

  /**
   * Rewinds the watermark to the epoch so the next `detect()` is DIRTY.
   * Used when a cycle fails after the outputs were already written.
   */
  async markDirty(): Promise<void> {
    const { marker } = this.options;
    const epoch = new Date(0);
    try {
      await fs.utimes(marker, epoch, epoch);
    } catch (err) {
      // a missing marker already reads as DIRTY
      const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
      if (!missing) {
        throw new FilesystemError(`Cannot reset marker ${marker}`, marker, {
          cause: err,
        });
      }
    }
    this.current = "DIRTY";
  }
}
