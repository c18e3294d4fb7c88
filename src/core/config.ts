import * as TOML from "@iarna/toml";
import { existsSync, readFileSync, statSync } from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { z } from "zod";
import {
  CONFIG_FILENAME,
  DEFAULT_COMMIT_MESSAGE,
  DEFAULT_EXCLUDE_NAMES,
  DEFAULT_EXTENSIONS,
  DEFAULT_HOOK_TIMEOUT_MS,
  DEFAULT_IGNORE_FILENAME,
  DEFAULT_INTERVAL_MS,
  DEFAULT_MANIFEST_PATH,
  DEFAULT_MAX_BACKOFF_MS,
  DEFAULT_MAX_CONSECUTIVE_FAILURES,
  DEFAULT_PUSH_TIMEOUT_MS,
  DEFAULT_REMOTE,
  ENV_BRANCH,
  ENV_CONFIG,
  ENV_REMOTE,
  ENV_ROOT,
} from "../constants";
import { ConfigurationError } from "../errors";
import type { CategoryRule, HookSpec, StageScope } from "./types";

const positiveInt = z.number().int().positive();

const ManifestSchema = z.object({
  /** Manifest path, relative to the root */
  output: z.string().min(1).default(DEFAULT_MANIFEST_PATH),
  /** Prefix joined to each relative path with "/" */
  "base-url": z.string().optional(),
  extensions: z
    .array(z.string().min(1))
    .min(1, "At least one extension is required")
    .default([...DEFAULT_EXTENSIONS]),
  /** File or directory names skipped anywhere in the tree */
  exclude: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDE_NAMES]),
  "ignore-file": z.string().default(DEFAULT_IGNORE_FILENAME),
});

const CategorySchema = z.object({
  name: z.string().min(1),
  match: z.array(z.string().min(1)).min(1),
});

const IndexSchema = z.object({
  /** JSON index path, relative to the root. No index is written when unset */
  output: z.string().min(1).optional(),
  categories: z.array(CategorySchema).default([]),
});

const WatchSchema = z.object({
  /** Watermark file. Defaults to the manifest itself */
  marker: z.string().min(1).optional(),
  /** Gitignore-style patterns; defaults to one `*<ext>` per manifest extension */
  patterns: z.array(z.string().min(1)).optional(),
  "interval-ms": positiveInt.default(DEFAULT_INTERVAL_MS),
  "max-backoff-ms": positiveInt.default(DEFAULT_MAX_BACKOFF_MS),
  "max-consecutive-failures": positiveInt.default(
    DEFAULT_MAX_CONSECUTIVE_FAILURES,
  ),
  /** Wake early on filesystem notifications */
  notify: z.boolean().default(false),
});

const PublishSchema = z.object({
  enabled: z.boolean().default(true),
  push: z.boolean().default(true),
  remote: z.string().min(1).default(DEFAULT_REMOTE),
  /** Defaults to the checked-out branch */
  branch: z.string().min(1).optional(),
  stage: z.enum(["outputs", "all"]).default("outputs"),
  /** Extra paths staged alongside the generated outputs */
  paths: z.array(z.string().min(1)).default([]),
  message: z.string().min(1).default(DEFAULT_COMMIT_MESSAGE),
  "push-timeout-ms": positiveInt.default(DEFAULT_PUSH_TIMEOUT_MS),
});

const HookSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  requires: z.string().min(1).optional(),
  "timeout-ms": positiveInt.default(DEFAULT_HOOK_TIMEOUT_MS),
});

const ConfigFileSchema = z.object({
  /** Root directory, relative to the config file */
  root: z.string().min(1).optional(),
  manifest: ManifestSchema.default({}),
  index: IndexSchema.default({}),
  watch: WatchSchema.default({}),
  publish: PublishSchema.default({}),
  hooks: z
    .object({
      before: z.array(HookSchema).default([]),
    })
    .default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ResolvedConfig {
  /** Absolute root directory */
  readonly root: string;
  /** Absolute path of the config file that was read, if any */
  readonly configPath: string | null;
  readonly manifest: {
    readonly output: string;
    readonly baseUrl?: string;
    readonly extensions: readonly string[];
    readonly exclude: readonly string[];
    readonly ignoreFile: string;
  };
  readonly index: {
    readonly output?: string;
    readonly categories: readonly CategoryRule[];
  };
  readonly watch: {
    readonly marker: string;
    readonly patterns: readonly string[];
    readonly intervalMs: number;
    readonly maxBackoffMs: number;
    readonly maxConsecutiveFailures: number;
    readonly notify: boolean;
  };
  readonly publish: {
    readonly enabled: boolean;
    readonly push: boolean;
    readonly remote: string;
    readonly branch?: string;
    readonly stage: StageScope;
    readonly paths: readonly string[];
    readonly message: string;
    readonly pushTimeoutMs: number;
  };
  readonly hooks: readonly HookSpec[];
}

export interface LoadConfigOptions {
  /** Root from the command line; wins over env and config file */
  root?: string;
  /** Explicit config file path */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function normalizeExtension(ext: string): string {
  return ext.startsWith(".") ? ext : `.${ext}`;
}

function readConfigFile(configPath: string): ConfigFile {
  let data: unknown;
  try {
    data = TOML.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(
      `Could not read config ${configPath}: ${message}`,
    );
  }

  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(
      `Invalid config in ${configPath}:\n${issues.map((i) => ` - ${i}`).join("\n")}`,
      issues,
    );
  }
  return parsed.data;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Resolves the process configuration once at startup.
 *
 * Root precedence: `options.root` > `MANIFEST_WATCH_ROOT` > `root` in the
 * config file. The config file is `options.configPath`, then
 * `MANIFEST_WATCH_CONFIG`, then `manifest-watch.toml` at the root.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const cliRoot = options.root ?? env[ENV_ROOT];
  const explicitConfig = options.configPath ?? env[ENV_CONFIG];

  let configPath: string | null = null;
  if (explicitConfig) {
    configPath = resolve(cwd, explicitConfig);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
  } else if (cliRoot) {
    const candidate = join(resolve(cwd, cliRoot), CONFIG_FILENAME);
    if (existsSync(candidate)) configPath = candidate;
  }

  const file = configPath ? readConfigFile(configPath) : ConfigFileSchema.parse({});

  let root: string;
  if (cliRoot) {
    root = resolve(cwd, cliRoot);
  } else if (file.root && configPath) {
    root = resolve(dirname(configPath), file.root);
  } else {
    throw new ConfigurationError(
      `No root directory configured. Pass --root, set ${ENV_ROOT}, or set "root" in ${CONFIG_FILENAME}`,
    );
  }

  if (!isDirectory(root)) {
    throw new ConfigurationError(`Root directory does not exist: ${root}`);
  }

  const inRoot = (p: string) => (isAbsolute(p) ? p : join(root, p));

  const extensions = [
    ...new Set(file.manifest.extensions.map(normalizeExtension)),
  ];
  const manifestOutput = inRoot(file.manifest.output);

  const hooks: HookSpec[] = file.hooks.before.map((hook) => ({
    name: hook.name,
    command: hook.command,
    args: hook.args,
    requires: hook.requires,
    timeoutMs: hook["timeout-ms"],
  }));

  const config: ResolvedConfig = {
    root,
    configPath,
    manifest: {
      output: manifestOutput,
      baseUrl: file.manifest["base-url"]?.replace(/\/+$/, ""),
      extensions,
      exclude: file.manifest.exclude,
      ignoreFile: file.manifest["ignore-file"],
    },
    index: {
      output: file.index.output ? inRoot(file.index.output) : undefined,
      categories: file.index.categories,
    },
    watch: {
      marker: file.watch.marker ? inRoot(file.watch.marker) : manifestOutput,
      patterns: file.watch.patterns ?? extensions.map((ext) => `*${ext}`),
      intervalMs: file.watch["interval-ms"],
      maxBackoffMs: file.watch["max-backoff-ms"],
      maxConsecutiveFailures: file.watch["max-consecutive-failures"],
      notify: file.watch.notify,
    },
    publish: {
      enabled: file.publish.enabled,
      push: file.publish.push,
      remote: env[ENV_REMOTE] || file.publish.remote,
      branch: env[ENV_BRANCH] || file.publish.branch,
      stage: file.publish.stage,
      paths: file.publish.paths,
      message: file.publish.message,
      pushTimeoutMs: file.publish["push-timeout-ms"],
    },
    hooks,
  };

  return deepFreeze(config);
}

/** Default config written by `manifest-watch init` */
export function defaultConfigToml(): string {
  return `# manifest-watch configuration
root = "."

[manifest]
output = "${DEFAULT_MANIFEST_PATH}"
# base-url = "https://example.com/raw/main"
extensions = [${DEFAULT_EXTENSIONS.map((e) => `"${e}"`).join(", ")}]
exclude = [${DEFAULT_EXCLUDE_NAMES.map((e) => `"${e}"`).join(", ")}]

[watch]
interval-ms = ${DEFAULT_INTERVAL_MS}

[publish]
remote = "${DEFAULT_REMOTE}"
stage = "outputs"
message = "${DEFAULT_COMMIT_MESSAGE}"
`;
}
