import { describe, it, expect } from "vitest";
import { firstInvalidByte, toBytes, toText } from "../src/text.js";

describe("toText", () => {
  it("passes strings through and decodes bytes", () => {
    expect(toText("+-")).toBe("+-");
    expect(toText(new Uint8Array([0x2b, 0xc3, 0xa9]))).toBe("+é");
  });

  it("drops a byte order mark from source bytes", () => {
    expect(toText(new Uint8Array([0xef, 0xbb, 0xbf, 0x2b]))).toBe("+");
  });
});

describe("toBytes", () => {
  it("treats missing input as empty", () => {
    expect(toBytes(undefined)).toEqual(new Uint8Array(0));
  });

  it("encodes strings as UTF-8", () => {
    expect(toBytes("é")).toEqual(new Uint8Array([0xc3, 0xa9]));
  });
});

describe("firstInvalidByte", () => {
  it("returns -1 for valid text", () => {
    expect(firstInvalidByte(new Uint8Array([]))).toBe(-1);
    expect(firstInvalidByte(new TextEncoder().encode("héllo 😀"))).toBe(-1);
  });

  it("finds a lone invalid byte", () => {
    expect(firstInvalidByte(new Uint8Array([0x41, 0x42, 0xff]))).toBe(2);
  });

  it("finds the lead byte of an interrupted sequence", () => {
    expect(firstInvalidByte(new Uint8Array([0x41, 0xf0, 0x9f, 0x41]))).toBe(1);
  });

  it("finds a truncated sequence at the end", () => {
    expect(firstInvalidByte(new Uint8Array([0xe2, 0x82]))).toBe(0);
  });
});
