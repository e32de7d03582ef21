import type { Window } from "../../utils/range.js";
import { end, overlaps, touches } from "../../utils/range.js";
import {
  fromWireRange,
  maxChunkSize,
  plan,
  toRangeHeader,
  toWireRange,
} from "../planner.js";

describe("planner", () => {
  it("splits a download into windows below the threshold", () => {
    const windows = [...plan(646863, 65000)];
    expect(windows).toHaveLength(10);
    expect(windows[0]).toEqual({ start: 0, length: 65000 });
    expect(windows[9]).toEqual({ start: 585000, length: 61863 });
  });
  it("uses a full chunk for the last window when the length divides evenly", () => {
    const windows = [...plan(30, 10)];
    expect(windows).toEqual([
      { start: 0, length: 10 },
      { start: 10, length: 10 },
      { start: 20, length: 10 },
    ]);
  });
  it("yields nothing for an empty download", () => {
    expect([...plan(0, 65000)]).toEqual([]);
  });
  it("yields a single short window when the length is below the chunk size", () => {
    expect([...plan(7, 65000)]).toEqual([{ start: 0, length: 7 }]);
  });
  it("partitions the whole length without gaps or overlaps", () => {
    for (const totalLength of [1, 2, 7, 64, 65, 100, 1000, 4097]) {
      for (const chunkSize of [1, 3, 7, 64, 1000, 4096]) {
        const windows = [...plan(totalLength, chunkSize)];
        let previous: Window | undefined;
        let covered = 0;
        for (const window of windows) {
          expect(window.length).toBeGreaterThan(0);
          expect(window.length).toBeLessThanOrEqual(chunkSize);
          if (previous === undefined) {
            expect(window.start).toBe(0);
          } else {
            expect(touches(previous, window)).toBe(true);
            expect(overlaps(previous, window)).toBe(false);
          }
          covered += window.length;
          previous = window;
        }
        expect(covered).toBe(totalLength);
        expect(previous === undefined ? 0 : end(previous)).toBe(totalLength);
      }
    }
  });
  it("rejects invalid chunk sizes", () => {
    expect(() => [...plan(10, 0)]).toThrow(RangeError);
    expect(() => [...plan(10, 1.5)]).toThrow(RangeError);
    expect(() => [...plan(10, maxChunkSize + 1)]).toThrow(RangeError);
  });
  it("rejects invalid lengths", () => {
    expect(() => [...plan(-1, 10)]).toThrow(RangeError);
    expect(() => [...plan(Number.MAX_SAFE_INTEGER + 1, 10)]).toThrow(
      RangeError
    );
  });
});

describe("wire range", () => {
  it("sends the exclusive end bound", () => {
    expect(toWireRange({ start: 0, length: 65000 })).toEqual({
      start: 0,
      end: 65000,
    });
    expect(toRangeHeader({ start: 0, length: 65000 })).toBe("bytes=0-65000");
    expect(toRangeHeader({ start: 585000, length: 61863 })).toBe(
      "bytes=585000-646863"
    );
    expect(toRangeHeader({ start: 5, length: 1 })).toBe("bytes=5-6");
  });
  it("is read back by the server as the planned window", () => {
    for (const window of plan(646863, 65000)) {
      expect(fromWireRange(toWireRange(window))).toEqual(window);
    }
  });
});
