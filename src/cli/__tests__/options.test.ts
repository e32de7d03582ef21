import { InvalidArgumentError } from "commander";

import { parseInteger, parseSize, parseUrl } from "../options.js";

describe("option parsers", () => {
  it("parses non-negative integers", () => {
    expect(parseInteger("0")).toBe(0);
    expect(parseInteger("250")).toBe(250);
    expect(() => parseInteger("-1")).toThrow(InvalidArgumentError);
    expect(() => parseInteger("1.5")).toThrow(InvalidArgumentError);
  });
  it("parses sizes with and without units", () => {
    expect(parseSize("300")).toBe(300);
    expect(parseSize("64KB")).toBe(65536);
    expect(() => parseSize("0")).toThrow(InvalidArgumentError);
    expect(() => parseSize("lots")).toThrow(InvalidArgumentError);
  });
  it("accepts http and https URLs", () => {
    expect(parseUrl("http://127.0.0.1:8080/")).toBe("http://127.0.0.1:8080/");
    expect(parseUrl("https://example.com/file")).toBe(
      "https://example.com/file"
    );
  });
  it("rejects anything else as a URL", () => {
    expect(() => parseUrl("not a url")).toThrow("Not an http or https URL.");
    expect(() => parseUrl("ftp://example.com/file")).toThrow(
      InvalidArgumentError
    );
  });
});
