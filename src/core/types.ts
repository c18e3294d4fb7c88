/** Two-state watermark comparison result */
export type ChangeState = "CLEAN" | "DIRTY";

export interface DetectionResult {
  state: ChangeState;
  /** Relative POSIX paths newer than the marker, sorted */
  changed: string[];
  /** Marker mtime in ms, or null when the marker does not exist */
  markerMtimeMs: number | null;
}

/** Which paths the publisher stages before committing */
export type StageScope = "outputs" | "all";

export interface PublishResult {
  /** True if a new commit was created this call */
  committed: boolean;
  /** True if a push was attempted and succeeded */
  pushed: boolean;
  commitMessage?: string;
  /** Set when a push was attempted and failed (or timed out) */
  pushError?: string;
}

export interface HookSpec {
  name: string;
  command: string;
  args: string[];
  /** Path (relative to root) that must exist for the hook to run */
  requires?: string;
  timeoutMs: number;
}

export interface HookResult {
  name: string;
  status: "ok" | "skipped" | "failed";
  exitCode?: number | null;
  message?: string;
}

export interface CategoryRule {
  name: string;
  /** Substrings matched against the relative path */
  match: string[];
}

export interface CycleResult {
  state: ChangeState;
  /** True if the manifest was regenerated this cycle */
  regenerated: boolean;
  entries?: number;
  publish?: PublishResult;
  hooks?: HookResult[];
}
