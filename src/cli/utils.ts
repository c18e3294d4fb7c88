import { flag, option, optional, string } from "cmd-ts";
import * as os from "node:os";
import { loadConfig, type ResolvedConfig } from "../core/config";
import { ConfigurationError } from "../errors";
import { fail, setVerbose } from "../logging";

/** Options every command accepts */
export const commonArgs = {
  root: option({
    type: optional(string),
    long: "root",
    short: "r",
    description: "Directory to index (overrides MANIFEST_WATCH_ROOT)",
  }),
  config: option({
    type: optional(string),
    long: "config",
    short: "c",
    description: "Path to manifest-watch.toml",
  }),
  verbose: flag({
    long: "verbose",
    description: "Show debug output",
  }),
};

export interface CommonArgs {
  root?: string;
  config?: string;
  verbose: boolean;
}

/**
 * Loads the configuration or exits with status 1.
 * Configuration problems are fatal at startup.
 */
export function loadConfigOrExit(args: CommonArgs): ResolvedConfig {
  setVerbose(args.verbose);
  try {
    return loadConfig({ root: args.root, configPath: args.config });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      fail(err.message);
      process.exit(1);
    }
    throw err;
  }
}

/**
 * Shortens a path by replacing the home directory with ~
 */
export function shortenPath(filePath: string): string {
  const home = os.homedir();
  if (filePath.startsWith(home)) {
    return "~" + filePath.slice(home.length);
  }
  return filePath;
}
