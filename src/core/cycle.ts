import { relative, sep } from "node:path";
import { GitCli } from "../git/git-cli";
import type { VersionControl } from "../git/types";
import { debug, info } from "../logging";
import { spawnRunner, type CommandRunner } from "../process";
import { buildIndex, writeIndex } from "../tree/index-builder";
import {
  collectFiles,
  toEntries,
  writeManifest,
} from "../tree/manifest-builder";
import { toPosix } from "../tree/walk";
import { ChangeDetector } from "./change-detector";
import type { ResolvedConfig } from "./config";
import { runHooks } from "./hooks";
import { CommitPublisher } from "./publisher";
import type { CycleResult } from "./types";

export interface CycleContext {
  config: ResolvedConfig;
  detector: ChangeDetector;
  /** Null when publishing is disabled */
  publisher: CommitPublisher | null;
  runner: CommandRunner;
  now: () => Date;
}

export interface ContextDeps {
  vcs?: VersionControl;
  runner?: CommandRunner;
  now?: () => Date;
}

/** Absolute paths of every file a cycle writes */
export function outputPaths(config: ResolvedConfig): string[] {
  const paths = [config.manifest.output, config.watch.marker];
  if (config.index.output) paths.push(config.index.output);
  return [...new Set(paths)];
}

/**
 * Root-relative POSIX paths handed to the publisher: the generated
 * manifest and index plus any configured extras. The marker only carries
 * an mtime, which git does not record.
 */
export function publishPaths(config: ResolvedConfig): string[] {
  const generated = [config.manifest.output];
  if (config.index.output) generated.push(config.index.output);
  const inRoot = generated
    .map((p) => relative(config.root, p))
    .filter((p) => p !== "" && !p.startsWith(`..${sep}`) && p !== "..")
    .map(toPosix);
  return [...new Set([...inRoot, ...config.publish.paths])].sort();
}

export function createContext(
  config: ResolvedConfig,
  deps: ContextDeps = {},
): CycleContext {
  const runner = deps.runner ?? spawnRunner;
  const now = deps.now ?? (() => new Date());

  const detector = new ChangeDetector({
    root: config.root,
    marker: config.watch.marker,
    patterns: config.watch.patterns,
    exclude: config.manifest.exclude,
    ignoreFile: config.manifest.ignoreFile,
    skip: outputPaths(config),
  });

  const publisher = config.publish.enabled
    ? new CommitPublisher({
        vcs: deps.vcs ?? new GitCli(config.root, runner),
        stage: config.publish.stage,
        push: config.publish.push,
        remote: config.publish.remote,
        branch: config.publish.branch,
        message: config.publish.message,
        pushTimeoutMs: config.publish.pushTimeoutMs,
        now,
      })
    : null;

  return { config, detector, publisher, runner, now };
}

export interface RegenerateResult {
  entries: string[];
  indexWritten: boolean;
}

/** Rebuilds the manifest (and index, when configured) without publishing */
export async function regenerate(ctx: CycleContext): Promise<RegenerateResult> {
  const { config } = ctx;
  const files = await collectFiles(config.root, {
    extensions: config.manifest.extensions,
    baseUrl: config.manifest.baseUrl,
    exclude: config.manifest.exclude,
    ignoreFile: config.manifest.ignoreFile,
    skip: outputPaths(config),
  });

  const entries = toEntries(files, config.manifest.baseUrl);
  await writeManifest(config.manifest.output, entries);
  debug(`Wrote ${entries.length} entries to ${config.manifest.output}`);

  let indexWritten = false;
  if (config.index.output) {
    const index = buildIndex(files, {
      baseUrl: config.manifest.baseUrl,
      categories: config.index.categories,
      now: ctx.now(),
    });
    indexWritten = await writeIndex(config.index.output, index);
  }

  return { entries, indexWritten };
}

/**
 * One detect → hooks → regenerate → publish pass.
 *
 * A CLEAN tree only retries a pending push. With `force` the tree is
 * regenerated regardless of the detector. The watermark moves only after
 * the commit step succeeded; on failure it is rewound so the next cycle
 * tries again.
 */
export async function runCycle(
  ctx: CycleContext,
  options: { force?: boolean } = {},
): Promise<CycleResult> {
  const { config, detector, publisher } = ctx;
  const detection = await detector.detect();

  if (detection.state === "CLEAN" && !options.force) {
    if (publisher?.needsPush()) {
      return {
        state: "CLEAN",
        regenerated: false,
        publish: publisher.retryPush(),
      };
    }
    debug("No changes detected");
    return { state: "CLEAN", regenerated: false };
  }

  if (detection.changed.length > 0) {
    info(`Changes detected in ${detection.changed.length} file(s)`);
    for (const path of detection.changed) debug(`  ${path}`);
  }

  const hooks = runHooks(config.root, config.hooks, ctx.runner);

  // taken after the hooks so their own writes do not re-trigger
  const startedAt = ctx.now();
  try {
    const { entries } = await regenerate(ctx);
    const publish = publisher?.publish(publishPaths(config));
    await detector.markClean(startedAt);

    return {
      state: detection.state,
      regenerated: true,
      entries: entries.length,
      publish,
      hooks,
    };
  } catch (err) {
    await detector.markDirty();
    throw err;
  }
}
