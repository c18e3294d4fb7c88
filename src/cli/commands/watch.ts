import { command, flag } from "cmd-ts";
import { createContext } from "../../core/cycle";
import { WatchLoop } from "../../core/watcher";
import { GitCli } from "../../git/git-cli";
import { fail, info } from "../../logging";
import { commonArgs, loadConfigOrExit, shortenPath } from "../utils";

export const watch = command({
  name: "watch",
  description:
    "Poll for changes, regenerate the manifest and publish it until interrupted",
  args: {
    ...commonArgs,
    notify: flag({
      long: "notify",
      short: "n",
      description: "Also wake on filesystem notifications",
    }),
  },
  handler: async ({ notify, ...args }) => {
    const config = loadConfigOrExit(args);

    if (config.publish.enabled && !new GitCli(config.root).isRepository()) {
      fail(`Not a git repository: ${shortenPath(config.root)}`);
      process.exit(1);
    }

    const controller = new AbortController();
    const stop = (signal: NodeJS.Signals) => {
      if (controller.signal.aborted) return;
      info(`Received ${signal}, finishing current cycle...`);
      controller.abort();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    const loop = new WatchLoop(createContext(config), {
      intervalMs: config.watch.intervalMs,
      maxBackoffMs: config.watch.maxBackoffMs,
      maxConsecutiveFailures: config.watch.maxConsecutiveFailures,
      notify: notify || config.watch.notify,
      signal: controller.signal,
    });

    await loop.run();
  },
});
