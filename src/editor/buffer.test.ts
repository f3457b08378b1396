import { describe, expect, it } from "vitest";
import {
  advanceCodePoints,
  codePointAt,
  codePointBefore,
  codePointLength,
  nextBoundary,
  prevBoundary,
  snapToBoundary,
  TextBuffer,
} from "./buffer.js";

describe("boundaries", () => {
  it("snaps offsets into range and off split surrogate pairs", () => {
    expect(snapToBoundary("a😀", 2)).toBe(1);
    expect(snapToBoundary("a😀", 3)).toBe(3);
    expect(snapToBoundary("abc", 10)).toBe(3);
    expect(snapToBoundary("abc", -3)).toBe(0);
  });

  it("steps over whole code points", () => {
    expect(nextBoundary("😀x", 0)).toBe(2);
    expect(nextBoundary("😀x", 3)).toBe(3);
    expect(prevBoundary("😀x", 2)).toBe(0);
    expect(prevBoundary("😀x", 0)).toBe(0);
  });

  it("reads the code point at and before an offset", () => {
    expect(codePointAt("a😀", 1)).toBe("😀");
    expect(codePointAt("a😀", 3)).toBeUndefined();
    expect(codePointBefore("a😀", 3)).toBe("😀");
    expect(codePointBefore("a😀", 0)).toBeUndefined();
  });

  it("counts and walks code points", () => {
    expect(codePointLength("a😀b")).toBe(3);
    expect(advanceCodePoints("😀😀ab", 0, 3)).toBe(5);
    expect(advanceCodePoints("😀😀ab", 0, 10, 4)).toBe(4);
  });
});

describe("TextBuffer", () => {
  it("inserts and returns the offset past the insertion", () => {
    const buffer = new TextBuffer("ac");
    expect(buffer.insert(1, "b")).toBe(2);
    expect(buffer.text).toBe("abc");
  });

  it("never inserts inside a surrogate pair", () => {
    const buffer = new TextBuffer("😀");
    expect(buffer.insert(1, "x")).toBe(1);
    expect(buffer.text).toBe("x😀");
  });

  it("removes a range and returns it", () => {
    const buffer = new TextBuffer("hello world");
    expect(buffer.remove(5, 11)).toBe(" world");
    expect(buffer.text).toBe("hello");
    expect(buffer.remove(3, 3)).toBe("");
    expect(buffer.length).toBe(5);
  });

  it("reports emptiness after load", () => {
    const buffer = new TextBuffer("x");
    buffer.load("");
    expect(buffer.isEmpty()).toBe(true);
    expect(buffer.length).toBe(0);
  });
});
