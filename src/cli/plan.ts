import { Command } from "commander";

import { makeDownloadSpec } from "../client/download-spec.js";
import { plan, toRangeHeader } from "../client/planner.js";
import { getConfig } from "../config.js";
import { toString } from "../utils/range.js";
import { parseSize } from "./options.js";

export const makePlanCommand = (): Command => {
  const config = getConfig();

  const command = new Command();
  command
    .name(`plan`)
    .description("Print the windows and range headers of a download")
    .showHelpAfterError()
    .argument("<length>", "Expected total length in bytes")
    .option(
      "--chunk-size <size>",
      "Bytes per request, must stay below the truncation threshold",
      parseSize,
      config.chunkSize
    )
    .action((length: string) => {
      const { expectedLength } = makeDownloadSpec(length);
      const { chunkSize } = command.opts<{ chunkSize: number }>();

      let count = 0;
      for (const window of plan(expectedLength, chunkSize)) {
        count += 1;
        process.stdout.write(
          `${toString(window)}\t${window.length}\t${toRangeHeader(window)}\n`
        );
      }
      process.stdout.write(`${count} windows\n`);
    });
  return command;
};
