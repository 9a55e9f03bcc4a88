import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../errors.js";
import { isLogType, parseLogType, parseLogTypes, sortLogTypes, splitLogTypeList } from "../logTypes.js";

describe("log types", () => {
  it("accepts exactly the four upper-case log types", () => {
    expect(["INFO", "TOOL", "ERROR", "DEBUG"].every(isLogType)).toBe(true);
    expect(isLogType("info")).toBe(false);
    expect(isLogType(3)).toBe(false);
    expect(parseLogType("TOOL")).toBe("TOOL");
    expect(() => parseLogType(undefined)).toThrow(InvalidArgumentError);
  });

  it("parses sets without duplicates and sorts into canonical order", () => {
    expect(sortLogTypes(parseLogTypes(["DEBUG", "INFO", "DEBUG"]))).toEqual(["INFO", "DEBUG"]);
  });

  it("splits comma-separated command line input", () => {
    expect(splitLogTypeList(" info, Error ,,debug")).toEqual(["INFO", "ERROR", "DEBUG"]);
    expect(splitLogTypeList("")).toEqual([]);
  });
});
