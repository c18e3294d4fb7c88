import { command, flag } from "cmd-ts";
import { createContext, runCycle } from "../../core/cycle";
import { errorMessage, isRecoverable } from "../../errors";
import { GitCli } from "../../git/git-cli";
import { describeCycle, fail, success, warn } from "../../logging";
import { commonArgs, loadConfigOrExit, shortenPath } from "../utils";

export const once = command({
  name: "once",
  description: "Run a single regenerate + commit + push cycle",
  args: {
    ...commonArgs,
    ifChanged: flag({
      long: "if-changed",
      description: "Skip regeneration when nothing is newer than the marker",
    }),
  },
  handler: async ({ ifChanged, ...args }) => {
    const config = loadConfigOrExit(args);

    if (config.publish.enabled && !new GitCli(config.root).isRepository()) {
      fail(`Not a git repository: ${shortenPath(config.root)}`);
      process.exit(1);
    }

    try {
      const result = await runCycle(createContext(config), {
        force: !ifChanged,
      });

      const summary = describeCycle(result);
      const failed =
        Boolean(result.publish?.pushError) ||
        (result.hooks ?? []).some((h) => h.status === "failed");
      if (failed) warn(summary);
      else success(summary);
    } catch (err) {
      if (!isRecoverable(err)) throw err;
      fail(errorMessage(err));
      process.exit(1);
    }
  },
});
