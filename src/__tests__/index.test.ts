import undici from "undici";

import { jest } from "@jest/globals";

import {
  makeSource,
  quirkyServer,
  url,
} from "../client/__tests__/quirky-server.js";
import { digest, formatDigest } from "../client/verifier.js";
import { main } from "../index.js";
import { DigestMismatchError } from "../utils/errors.js";

describe("main", () => {
  const source = makeSource(1000);
  const options = ["--url", url, "--chunk-size", "300", "--no-progress"];
  const argv = (...args: string[]) => [
    "node",
    "chunkfetch",
    "download",
    ...args,
    ...options,
  ];

  let stderr: string[];

  beforeEach(() => {
    process.exitCode = undefined;
    jest.spyOn(process.stdout, "write").mockImplementation(() => true);
    stderr = [];
    jest.spyOn(process.stderr, "write").mockImplementation((chunk) => {
      stderr.push(String(chunk));
      return true;
    });
  });
  afterEach(() => {
    process.exitCode = undefined;
    jest.restoreAllMocks();
  });

  it("leaves the exit status alone on success", async () => {
    jest.spyOn(undici, "request").mockImplementation(quirkyServer(source));

    await main(argv("1000"));
    expect(process.exitCode).toBeUndefined();
    expect(stderr).toEqual([]);
  });
  it("exits with status 1 on a digest mismatch", async () => {
    jest.spyOn(undici, "request").mockImplementation(quirkyServer(source));

    const expected = formatDigest(digest(source.subarray(1)));
    await main(argv("1000", expected));
    expect(process.exitCode).toBe(1);
    const error = new DigestMismatchError(
      expected,
      formatDigest(digest(source))
    );
    expect(stderr).toEqual([`${error.message}\n`]);
  });
  it("exits with status 1 when the download is aborted", async () => {
    jest
      .spyOn(undici, "request")
      .mockImplementation(quirkyServer(source, 200));

    await main(argv("1000"));
    expect(process.exitCode).toBe(1);
    expect(stderr).toEqual([
      "Length mismatch for window [0, 300): expected 300 bytes but received 200\n",
    ]);
  });
});
