/** CLI name and version reported by `--version` */
export const CLI_NAME = "manifest-watch";
export const CLI_VERSION = "0.1.0";

/** Config filename looked up at the watched root */
export const CONFIG_FILENAME = "manifest-watch.toml";

/** Ignore file (gitignore syntax) read from the watched root */
export const DEFAULT_IGNORE_FILENAME = ".manifestignore";

/** Default manifest path relative to the root */
export const DEFAULT_MANIFEST_PATH = "manifest.txt";

/** Extensions listed in the manifest unless configured otherwise */
export const DEFAULT_EXTENSIONS = [".json", ".py", ".md", ".txt", ".sh"] as const;

/** Directory/file names skipped anywhere in the tree */
export const DEFAULT_EXCLUDE_NAMES = [".git", "node_modules"] as const;

export const DEFAULT_INTERVAL_MS = 30_000;
export const DEFAULT_MAX_BACKOFF_MS = 15 * 60_000;
export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 5;
export const DEFAULT_PUSH_TIMEOUT_MS = 60_000;
export const DEFAULT_HOOK_TIMEOUT_MS = 5 * 60_000;

export const DEFAULT_REMOTE = "origin";
export const DEFAULT_COMMIT_MESSAGE = "Regenerate manifest | {timestamp}";

/** Environment variables read during config resolution */
export const ENV_ROOT = "MANIFEST_WATCH_ROOT";
export const ENV_CONFIG = "MANIFEST_WATCH_CONFIG";
export const ENV_REMOTE = "MANIFEST_WATCH_REMOTE";
export const ENV_BRANCH = "MANIFEST_WATCH_BRANCH";
