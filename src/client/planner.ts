import type { Window } from "../utils/range.js";

export const maxChunkSize = 0xffffffff;

export interface WireRange {
  start: number;
  end: number;
}

/**
 * Splits `[0, totalLength)` into consecutive windows of `chunkSize` bytes,
 * the last one taking the remainder.
 *
 * `chunkSize` has to stay below the server's truncation threshold. That
 * threshold is known out of band and is not checked here.
 */
export function* plan(
  totalLength: number,
  chunkSize: number
): Generator<Window, void, undefined> {
  if (!Number.isSafeInteger(totalLength) || totalLength < 0) {
    throw new RangeError(`Invalid total length: ${totalLength}`);
  }
  if (
    !Number.isInteger(chunkSize) ||
    chunkSize <= 0 ||
    chunkSize > maxChunkSize
  ) {
    throw new RangeError(`Invalid chunk size: ${chunkSize}`);
  }
  for (let start = 0; start < totalLength; start += chunkSize) {
    yield { start, length: Math.min(chunkSize, totalLength - start) };
  }
}

// The server reads "bytes=a-b" as [a, b), so the end bound is not
// decremented the way an inclusive range would be
export const toWireRange = ({ start, length }: Window): WireRange => ({
  start,
  end: start + length,
});

export const fromWireRange = ({ start, end }: WireRange): Window => ({
  start,
  length: end - start,
});

export const toRangeHeader = (window: Window): string => {
  const { start, end } = toWireRange(window);
  return `bytes=${start}-${end}`;
};
