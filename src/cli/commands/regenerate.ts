import { command, flag } from "cmd-ts";
import { createContext, regenerate as regenerateManifest } from "../../core/cycle";
import { isRecoverable, errorMessage } from "../../errors";
import { fail, info, raw, start, success } from "../../logging";
import { renderManifest } from "../../tree/manifest-builder";
import { commonArgs, loadConfigOrExit, shortenPath } from "../utils";

export const regenerate = command({
  name: "regenerate",
  description: "Rebuild the manifest (and index) once without committing",
  args: {
    ...commonArgs,
    print: flag({
      long: "print",
      short: "p",
      description: "Also print the manifest to stdout",
    }),
  },
  handler: async ({ print, ...args }) => {
    const config = loadConfigOrExit(args);
    const ctx = createContext(config);

    start(`Scanning ${shortenPath(config.root)}...`);
    try {
      // the watermark stays put so a later watch cycle still publishes
      const { entries, indexWritten } = await regenerateManifest(ctx);

      success(
        `Manifest written: ${entries.length} entries → ${shortenPath(config.manifest.output)}`,
      );
      if (config.index.output) {
        info(
          indexWritten
            ? `Index written → ${shortenPath(config.index.output)}`
            : "Index already up to date",
        );
      }
      if (print) raw(renderManifest(entries));
    } catch (err) {
      if (!isRecoverable(err)) throw err;
      fail(errorMessage(err));
      process.exit(1);
    }
  },
});
