import { describe, it, expect } from "vitest";
import { mapKeyToChip8, keyLabelFor } from "../chip8-keymap";

describe("mapKeyToChip8", () => {
  it.each([
    ["1", 0x1], ["2", 0x2], ["3", 0x3], ["4", 0xc],
    ["q", 0x4], ["w", 0x5], ["e", 0x6], ["r", 0xd],
    ["a", 0x7], ["s", 0x8], ["d", 0x9], ["f", 0xe],
    ["z", 0xa], ["x", 0x0], ["c", 0xb], ["v", 0xf],
  ])("maps %s to keypad %i", (key, expected) => {
    expect(mapKeyToChip8(key)).toBe(expected);
  });

  it("ignores letter case", () => {
    expect(mapKeyToChip8("Q")).toBe(0x4);
    expect(mapKeyToChip8("V")).toBe(0xf);
  });

  it("returns null for unmapped keys", () => {
    expect(mapKeyToChip8("5")).toBeNull();
    expect(mapKeyToChip8("Enter")).toBeNull();
    expect(mapKeyToChip8(" ")).toBeNull();
  });
});

describe("keyLabelFor", () => {
  it("returns the keyboard label for a keypad index", () => {
    expect(keyLabelFor(0xc)).toBe("4");
    expect(keyLabelFor(0x0)).toBe("X");
    expect(keyLabelFor(0xf)).toBe("V");
  });

  it("returns null outside the keypad", () => {
    expect(keyLabelFor(16)).toBeNull();
  });
});
