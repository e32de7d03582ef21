import { parse } from "bytes";
import { InvalidArgumentError } from "commander";

import { urlSchema } from "../config.js";

export const parseInteger = (value: string): number => {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return n;
};

// Accepts plain byte counts as well as "64KB" and the like
export const parseSize = (value: string): number => {
  const n = parse(value);
  if (n === null || !Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Not a valid size.");
  }
  return n;
};

export const parseUrl = (value: string): string => {
  const { error } = urlSchema.validate(value);
  if (error !== undefined) {
    throw new InvalidArgumentError("Not an http or https URL.");
  }
  return value;
};
