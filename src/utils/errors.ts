import type { Window } from "./range.js";
import { toString } from "./range.js";

/**
 * Adapted from https://stackoverflow.com/a/65243177
 */
export class CustomError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Anything that aborts a download run
export abstract class DownloadError extends CustomError {}

export class TransportError extends DownloadError {
  readonly window: Window;
  readonly statusCode: number | undefined;
  readonly retryable: boolean;

  constructor(
    window: Window,
    message: string,
    {
      statusCode,
      retryable = false,
    }: { statusCode?: number; retryable?: boolean } = {}
  ) {
    super(`Transport error for window ${toString(window)}: ${message}`);
    this.window = window;
    this.statusCode = statusCode;
    this.retryable = retryable;
  }
}

export class LengthMismatchError extends DownloadError {
  readonly window: Window;
  readonly received: number;

  constructor(window: Window, received: number) {
    super(
      `Length mismatch for window ${toString(window)}: ` +
        `expected ${window.length} bytes but received ${received}`
    );
    this.window = window;
    this.received = received;
  }
}

export class WindowOrderError extends DownloadError {
  readonly window: Window;

  constructor(window: Window, message: string) {
    super(`Cannot write window ${toString(window)}: ${message}`);
    this.window = window;
  }
}

export class IncompleteAssemblyError extends DownloadError {
  readonly filled: number;
  readonly expected: number;

  constructor(filled: number, expected: number) {
    super(`Assembly is incomplete: ${filled} of ${expected} bytes written`);
    this.filled = filled;
    this.expected = expected;
  }
}

export class DigestMismatchError extends DownloadError {
  readonly expected: string;
  readonly computed: string;

  constructor(expected: string, computed: string) {
    super(`Digest mismatch!\n Expected: ${expected}\n Computed: ${computed}`);
    this.expected = expected;
    this.computed = computed;
  }
}
