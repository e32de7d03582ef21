import { constants } from "node:buffer";

import {
  IncompleteAssemblyError,
  LengthMismatchError,
  WindowOrderError,
} from "../utils/errors.js";
import type { Window } from "../utils/range.js";
import { end } from "../utils/range.js";

/**
 * Collects chunks into a single buffer of the expected length. Windows are
 * written strictly in order, so every byte is written exactly once.
 */
export class Assembler {
  private buffer: Buffer | null;
  private cursor = 0;

  constructor(readonly expectedLength: number) {
    if (
      !Number.isSafeInteger(expectedLength) ||
      expectedLength < 0 ||
      expectedLength > constants.MAX_LENGTH
    ) {
      throw new RangeError(`Cannot assemble ${expectedLength} bytes`);
    }
    this.buffer = Buffer.alloc(expectedLength);
  }

  get filled(): number {
    return this.cursor;
  }

  write(window: Window, chunk: Uint8Array): void {
    if (this.buffer === null) {
      throw new WindowOrderError(window, "buffer has already been handed off");
    }
    if (window.start !== this.cursor) {
      throw new WindowOrderError(
        window,
        `expected the next window to start at ${this.cursor}`
      );
    }
    if (end(window) > this.expectedLength) {
      throw new WindowOrderError(
        window,
        `window ends past the expected length of ${this.expectedLength}`
      );
    }
    if (chunk.length !== window.length) {
      throw new LengthMismatchError(window, chunk.length);
    }
    this.buffer.set(chunk, window.start);
    this.cursor = end(window);
  }

  isComplete(): boolean {
    return this.cursor === this.expectedLength;
  }

  intoBuffer(): Buffer {
    const { buffer } = this;
    if (buffer === null) {
      throw new Error("Assembled buffer has already been handed off");
    }
    if (!this.isComplete()) {
      throw new IncompleteAssemblyError(this.cursor, this.expectedLength);
    }
    this.buffer = null;
    return buffer;
  }
}
