import { command, flag, option, optional, string } from "cmd-ts";
import * as fs from "node:fs";
import * as path from "node:path";
import { CONFIG_FILENAME } from "../../constants";
import { defaultConfigToml } from "../../core/config";
import { fail, info, success } from "../../logging";
import { shortenPath } from "../utils";

export const init = command({
  name: "init",
  description: `Write a default ${CONFIG_FILENAME} into a directory`,
  args: {
    root: option({
      type: optional(string),
      long: "root",
      short: "r",
      description: "Target directory (defaults to the current directory)",
    }),
    force: flag({
      long: "force",
      short: "f",
      description: "Overwrite an existing config",
    }),
  },
  handler: async ({ root, force }) => {
    const targetDir = path.resolve(root ?? process.cwd());
    if (!fs.existsSync(targetDir) || !fs.statSync(targetDir).isDirectory()) {
      fail(`Not a directory: ${targetDir}`);
      process.exit(1);
    }

    const configPath = path.join(targetDir, CONFIG_FILENAME);
    if (fs.existsSync(configPath) && !force) {
      success(`Config already exists`);
      info(`  ${shortenPath(configPath)}`);
      info(`  Use --force to overwrite`);
      return;
    }

    fs.writeFileSync(configPath, defaultConfigToml());
    success(`Wrote ${shortenPath(configPath)}`);
  },
});
