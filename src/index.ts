// Re-export all public APIs from focused source files
export type {
  ChangeState,
  DetectionResult,
  PublishResult,
  StageScope,
  HookSpec,
  HookResult,
  CategoryRule,
  CycleResult,
} from "./core/types";
export type { ResolvedConfig, LoadConfigOptions } from "./core/config";
export type { VersionControl } from "./git/types";
export type { CommandRunner, CommandResult } from "./process";
export {
  ManifestWatchError,
  FilesystemError,
  VersionControlError,
  ConfigurationError,
} from "./errors";
export { loadConfig, defaultConfigToml } from "./core/config";
export { ChangeDetector } from "./core/change-detector";
export {
  CommitPublisher,
  formatTimestamp,
  renderCommitMessage,
} from "./core/publisher";
export { runHooks } from "./core/hooks";
export { createContext, regenerate, runCycle } from "./core/cycle";
export { WatchLoop, backoffDelay } from "./core/watcher";
export { GitCli } from "./git/git-cli";
export {
  buildManifest,
  collectFiles,
  renderManifest,
  writeManifest,
} from "./tree/manifest-builder";
export { buildIndex, writeIndex } from "./tree/index-builder";
export { walkFiles } from "./tree/walk";
