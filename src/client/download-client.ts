import { Command, Option } from "commander";
import EventEmitter from "node:events";

import { parseInteger, parseSize, parseUrl } from "../cli/options.js";
import { getConfig } from "../config.js";
import Debug from "../utils/debug.js";
import { DigestMismatchError, DownloadError } from "../utils/errors.js";
import { Progress } from "../utils/progress.js";
import type { Window } from "../utils/range.js";
import { Assembler } from "./assembler.js";
import type { DownloadSpec } from "./download-spec.js";
import { makeDownloadSpec } from "./download-spec.js";
import { ChunkFetcher, FetcherOptions } from "./fetcher.js";
import { plan } from "./planner.js";
import type { Outcome } from "./verifier.js";
import { compare, digest, formatDigest } from "./verifier.js";

const debug = Debug("client");

export type State =
  | { type: "planning" }
  | { type: "fetching"; window: Window }
  | { type: "assembling"; window: Window }
  | { type: "verifying" }
  | { type: "done"; outcome: Outcome }
  | { type: "aborted"; reason: DownloadError };
export type TerminalState = Extract<State, { type: "done" | "aborted" }>;

export interface DownloadClientOptions extends FetcherOptions {
  chunkSize: number;
}

/**
 * Drives one download: windows are fetched and written one at a time, in
 * order, and the first failure aborts the run.
 *
 * Emits `"state"` on every transition and `"chunk"` with the window and the
 * number of bytes filled after each write.
 */
export class DownloadClient extends EventEmitter {
  readonly chunkSize: number;
  readonly fetcher: ChunkFetcher;

  state: State = { type: "planning" };

  constructor({ chunkSize, ...fetcherOptions }: DownloadClientOptions) {
    super();
    this.chunkSize = chunkSize;
    this.fetcher = new ChunkFetcher(fetcherOptions);
  }

  private transition<S extends State>(state: S): S {
    this.state = state;
    this.emit("state", state);
    return state;
  }

  async run(spec: DownloadSpec): Promise<TerminalState> {
    const { expectedLength, expectedDigest } = spec;
    this.transition({ type: "planning" });
    const windows = plan(expectedLength, this.chunkSize);
    const assembler = new Assembler(expectedLength);

    debug(
      "downloading %d bytes in windows of up to %d bytes from %s",
      expectedLength,
      this.chunkSize,
      this.fetcher.url
    );
    try {
      for (const window of windows) {
        this.transition({ type: "fetching", window });
        const chunk = await this.fetcher.fetch(window);

        this.transition({ type: "assembling", window });
        assembler.write(window, chunk);
        this.emit("chunk", window, assembler.filled);
      }
      // Unreachable as long as the planner covers the whole length
      const buffer = assembler.intoBuffer();

      this.transition({ type: "verifying" });
      const outcome = compare(digest(buffer), expectedDigest);
      debug("download finished with outcome %s", outcome.type);
      return this.transition({ type: "done", outcome });
    } catch (error: unknown) {
      if (!(error instanceof DownloadError)) {
        throw error;
      }
      debug("aborting download: %s", error.message);
      return this.transition({ type: "aborted", reason: error });
    }
  }
}

type DownloadCommandOptions = {
  url: string;
  chunkSize: number;
  retries: number;
  retryDelay: number;
  timeout: number;
  progress: boolean;
};

export const makeDownloadClientCommand = (): Command => {
  const config = getConfig();

  const command = new Command();
  command
    .name(`download`)
    .description("Download a file of known length in range requests")
    .showHelpAfterError()
    .argument("<length>", "Expected total length in bytes")
    .argument("[digest]", "Expected hex encoded SHA-256 digest")
    .addOption(
      new Option("--url <value>", "Where the server is located")
        .argParser(parseUrl)
        .default(config.url)
    )
    .addOption(
      new Option(
        "--chunk-size <size>",
        "Bytes per request, must stay below the truncation threshold"
      )
        .argParser(parseSize)
        .default(config.chunkSize)
    )
    .addOption(
      new Option("--retries <count>", "Retries per window on transient errors")
        .argParser(parseInteger)
        .default(config.retries)
    )
    .addOption(
      new Option("--retry-delay <ms>", "Delay between retries")
        .argParser(parseInteger)
        .default(config.retryDelay)
    )
    .addOption(
      new Option("--timeout <ms>", "Timeout for each request")
        .argParser(parseInteger)
        .default(config.timeout)
    )
    .option("--no-progress", "Do not show a progress bar")
    .action(async (length: string, digestHex: string | undefined) => {
      const options = command.opts<DownloadCommandOptions>();
      debug("running with options %o", options);

      const spec = makeDownloadSpec(length, digestHex);
      process.stdout.write(
        `Expected total size: ${spec.expectedLength} bytes\n`
      );

      const { progress: showProgress, ...clientOptions } = options;
      const downloadClient = new DownloadClient(clientOptions);
      const progress = showProgress
        ? new Progress(spec.expectedLength)
        : undefined;
      if (progress !== undefined) {
        downloadClient.on("chunk", (_: Window, filled: number) => {
          progress.complete(filled);
        });
      }

      let state: TerminalState;
      try {
        state = await downloadClient.run(spec);
      } finally {
        progress?.terminate();
      }

      if (state.type === "aborted") {
        throw state.reason;
      }
      const { outcome } = state;
      switch (outcome.type) {
        case "match":
          process.stdout.write(
            `Computed SHA-256: ${formatDigest(outcome.digest)}\n`
          );
          process.stdout.write(
            "Success! Downloaded data matches the expected digest.\n"
          );
          break;
        case "no-expected":
          process.stdout.write(
            `Computed SHA-256: ${formatDigest(outcome.computed)}\n`
          );
          break;
        case "mismatch":
          throw new DigestMismatchError(
            formatDigest(outcome.expected),
            formatDigest(outcome.computed)
          );
      }
    });
  return command;
};
