#!/usr/bin/env -S NODE_OPTIONS="--no-warnings --enable-source-maps" node

import { Command } from "commander";

import { makePlanCommand } from "./cli/plan.js";
import { makeDownloadClientCommand } from "./client/download-client.js";
import Debug from "./utils/debug.js";
import { name, version } from "./utils/metadata.js";

export const makeCommand = (): Command => {
  const command = new Command();
  command
    .name(name)
    .version(version)
    .option("--debug", "Output extra debug information")
    .addCommand(makeDownloadClientCommand(), { isDefault: true })
    .addCommand(makePlanCommand())
    .hook("preAction", (that) => {
      const options = that.opts();
      if (process.env["DEBUG"]) {
        return;
      }
      if (options["debug"]) {
        Debug.enable("*");
      }
    });
  return command;
};

// Any failure is reported on stderr and ends the process with status 1
export const main = async (argv: readonly string[]): Promise<void> => {
  try {
    await makeCommand().parseAsync(argv);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${message}\n`);
    process.exitCode = 1;
  }
};

if (require.main === module) {
  void main(process.argv);
}
