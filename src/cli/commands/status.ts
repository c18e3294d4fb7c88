import { command } from "cmd-ts";
import { createContext } from "../../core/cycle";
import { colors, info, log } from "../../logging";
import { commonArgs, loadConfigOrExit, shortenPath } from "../utils";

export const status = command({
  name: "status",
  description: "Show whether the manifest is out of date",
  args: { ...commonArgs },
  handler: async (args) => {
    const config = loadConfigOrExit(args);
    const { detector } = createContext(config);

    const detection = await detector.detect();
    const label =
      detection.state === "CLEAN"
        ? colors.green(detection.state)
        : colors.yellow(detection.state);

    log(`${colors.bold("State:")} ${label}`);
    info(`Marker: ${shortenPath(config.watch.marker)}`);
    if (detection.markerMtimeMs === null) {
      info("Marker does not exist yet");
    } else {
      info(`Last regeneration: ${new Date(detection.markerMtimeMs).toISOString()}`);
    }

    if (detection.changed.length > 0) {
      log(`\nChanged since last regeneration (${detection.changed.length}):`);
      for (const path of detection.changed) {
        log(`  ${colors.cyan(path)}`);
      }
    }
  },
});
