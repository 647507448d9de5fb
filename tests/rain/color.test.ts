import { describe, it, expect } from "vitest";
import {
  colorIndex,
  terminalColor,
  PALETTE_SIZE,
  SHADES_PER_DEPTH,
} from "../../src/rain/color.js";
import { NUM_DEPTHS } from "../../src/rain/types.js";

describe("colorIndex", () => {
  it("the leading symbol takes its depth's brightest shade whatever the length", () => {
    for (let depth = 0; depth < NUM_DEPTHS; depth++) {
      const expected = colorIndex(depth, 0, 4);
      expect(expected).toBe(depth * SHADES_PER_DEPTH);
      for (let length = 1; length <= 30; length++) {
        expect(colorIndex(depth, 0, length)).toBe(expected);
      }
    }
  });

  it("the first tail symbol of a long string takes the second brightest shade", () => {
    expect(colorIndex(0, 1, 30)).toBe(1);
    expect(colorIndex(2, 1, 30)).toBe(15);
  });

  it("fades toward the dimmest shade along the tail", () => {
    // 2/4 * 5 = 2.5 rounds to 3
    expect(colorIndex(0, 2, 4)).toBe(4);
    expect(colorIndex(0, 4, 4)).toBe(6);
  });

  it("stays inside the depth's block", () => {
    for (let depth = 0; depth < NUM_DEPTHS; depth++) {
      for (let length = 1; length <= 30; length++) {
        for (let index = 0; index < length; index++) {
          const color = colorIndex(depth, index, length);
          expect(color).toBeGreaterThanOrEqual(depth * SHADES_PER_DEPTH);
          expect(color).toBeLessThan((depth + 1) * SHADES_PER_DEPTH);
        }
      }
    }
  });

  it("palette covers every depth", () => {
    expect(PALETTE_SIZE).toBe(70);
  });
});

describe("terminalColor", () => {
  it("nearest head is a pale green", () => {
    expect(terminalColor(0)).toBe(157);
  });

  it("nearest tail fades from bright to dark green", () => {
    expect(terminalColor(1)).toBe(46);
    expect(terminalColor(6)).toBe(22);
  });

  it("deepest head is darker than the nearest", () => {
    expect(terminalColor(9 * SHADES_PER_DEPTH)).toBe(28);
  });

  it("every palette index maps into the 256-colour cube", () => {
    for (let i = 0; i < PALETTE_SIZE; i++) {
      const code = terminalColor(i);
      expect(code).toBeGreaterThanOrEqual(16);
      expect(code).toBeLessThanOrEqual(231);
    }
  });
});
