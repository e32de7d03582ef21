import Joi from "joi";

import { parseDigest } from "./verifier.js";

export type DownloadSpec = Readonly<{
  expectedLength: number;
  expectedDigest?: Buffer;
}>;

const lengthSchema = Joi.number()
  .integer()
  .min(0)
  .max(Number.MAX_SAFE_INTEGER)
  .required()
  .label("length");

/**
 * Validates caller input. `length` may be a number or its decimal string,
 * `digest` a hex encoded SHA-256 in either case.
 */
export const makeDownloadSpec = (
  length: unknown,
  digest?: string
): DownloadSpec => {
  const expectedLength: number = Joi.attempt(length, lengthSchema);
  if (digest === undefined) {
    return Object.freeze({ expectedLength });
  }
  const expectedDigest = parseDigest(digest);
  return Object.freeze({ expectedLength, expectedDigest });
};
