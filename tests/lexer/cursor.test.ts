import { describe, it, expect } from "vitest";
import { CharCursor } from "../../src/lexer/cursor.js";

describe("CharCursor", () => {
  it("peeks ahead without consuming", () => {
    const cursor = new CharCursor("abc");
    expect(cursor.peek()).toBe("a");
    expect(cursor.peek(1)).toBe("b");
    expect(cursor.peek(2)).toBe("c");
    expect(cursor.peek(3)).toBeUndefined();
    expect(cursor.next()).toBe("a");
  });

  it("consumes one character per call", () => {
    const cursor = new CharCursor("ab");
    expect(cursor.next()).toBe("a");
    expect(cursor.peek()).toBe("b");
    expect(cursor.next()).toBe("b");
    expect(cursor.isAtEnd()).toBe(true);
    expect(cursor.next()).toBeUndefined();
    expect(cursor.peek()).toBeUndefined();
  });

  it("steps over code points, not UTF-16 units", () => {
    const cursor = new CharCursor("a😀b");
    expect(cursor.next()).toBe("a");
    expect(cursor.peek(1)).toBe("b");
    expect(cursor.next()).toBe("😀");
    expect(cursor.next()).toBe("b");
  });

  it("starts at the end for empty input", () => {
    expect(new CharCursor("").isAtEnd()).toBe(true);
  });
});
