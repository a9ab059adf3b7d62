import { describe, it, expect } from "vitest";
import { parseArgs } from "../src/args.js";

describe("parseArgs", () => {
  it("takes the file and defaults", () => {
    expect(parseArgs(["prog.bf"])).toEqual({
      ok: true,
      value: { file: "prog.bf", trace: false, showTime: false },
    });
  });

  it("reads every option", () => {
    expect(parseArgs(["-i", "abc", "-s", "500", "-c", "64", "--trace", "-t", "prog.bf"])).toEqual({
      ok: true,
      value: { file: "prog.bf", input: "abc", maxSteps: 500, maxCells: 64, trace: true, showTime: true },
    });
  });

  it("reads an input file", () => {
    expect(parseArgs(["--input-file", "in.txt", "prog.bf"])).toEqual({
      ok: true,
      value: { file: "prog.bf", inputFile: "in.txt", trace: false, showTime: false },
    });
  });

  it("returns help before anything else", () => {
    expect(parseArgs(["--help", "--bogus"])).toEqual({ ok: true, value: "help" });
  });

  it("requires a file", () => {
    expect(parseArgs(["--trace"])).toEqual({ ok: false, error: "No input file specified" });
  });

  it("rejects unknown options", () => {
    expect(parseArgs(["--verbose", "prog.bf"])).toEqual({ ok: false, error: "Unknown option: --verbose" });
  });

  it("rejects a missing value", () => {
    expect(parseArgs(["prog.bf", "--input"])).toEqual({ ok: false, error: "Missing value for --input" });
    expect(parseArgs(["prog.bf", "-s"])).toEqual({ ok: false, error: "Missing value for -s" });
  });

  it("rejects counts that are not whole numbers", () => {
    expect(parseArgs(["-s", "1e3", "prog.bf"])).toEqual({
      ok: false,
      error: "Invalid value for -s: '1e3' (expected an integer >= 0)",
    });
    expect(parseArgs(["--max-cells", "0", "prog.bf"])).toEqual({
      ok: false,
      error: "Invalid value for --max-cells: '0' (expected an integer >= 1)",
    });
  });

  it("refuses two input sources", () => {
    expect(parseArgs(["-i", "a", "-f", "b", "prog.bf"])).toEqual({
      ok: false,
      error: "Use either --input or --input-file, not both",
    });
  });
});
