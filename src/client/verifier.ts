import Joi from "joi";
import { createHash } from "node:crypto";

export const algorithm = "sha256";

export type Outcome =
  | { type: "match"; digest: Buffer }
  | { type: "mismatch"; expected: Buffer; computed: Buffer }
  | { type: "no-expected"; computed: Buffer };

const digestSchema = Joi.string()
  .hex()
  .length(64)
  .lowercase()
  .required()
  .label("digest");

export const parseDigest = (hex: string): Buffer => {
  const value: string = Joi.attempt(hex, digestSchema);
  return Buffer.from(value, "hex");
};

export const formatDigest = (digest: Uint8Array): string =>
  Buffer.from(digest).toString("hex");

export const digest = (buffer: Uint8Array): Buffer =>
  createHash(algorithm).update(buffer).digest();

export const compare = (computed: Buffer, expected?: Buffer): Outcome => {
  if (expected === undefined) {
    return { type: "no-expected", computed };
  }
  if (computed.equals(expected)) {
    return { type: "match", digest: computed };
  }
  return { type: "mismatch", expected, computed };
};
