#!/usr/bin/env node
import { run, subcommands } from "cmd-ts";
import { CLI_NAME, CLI_VERSION } from "../constants";
import { error } from "../logging";
import { init } from "./commands/init";
import { once } from "./commands/once";
import { regenerate } from "./commands/regenerate";
import { status } from "./commands/status";
import { watch } from "./commands/watch";

// cmd-ts calls process.exit(1) for --help, override to exit 0
const isHelp = process.argv.includes("--help") || process.argv.includes("-h");
if (isHelp) {
  const originalExit = process.exit;
  process.exit = ((_code?: number) => {
    originalExit(0);
  }) as typeof process.exit;
}

const app = subcommands({
  name: CLI_NAME,
  description: "Keep a file manifest up to date and publish it with git",
  version: CLI_VERSION,
  cmds: {
    init,
    regenerate,
    status,
    once,
    watch,
  },
});

run(app, process.argv.slice(2)).catch((e: unknown) => {
  error("Command failed:", e);
  process.exit(1);
});
