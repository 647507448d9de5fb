import { describe, it, expect } from "vitest";
import { selectDepth, layerWeight } from "../../src/rain/depth.js";
import { createRandom } from "../../src/rain/random.js";
import { lowRandom, highRandom, brokenRandom } from "../helpers/random.js";

function histogram(maxDepth: number, draws: number, seed: number): number[] {
  const random = createRandom(seed);
  const counts = new Array<number>(maxDepth + 1).fill(0);
  for (let i = 0; i < draws; i++) {
    counts[selectDepth(random, maxDepth)]++;
  }
  return counts;
}

describe("selectDepth", () => {
  it("maxDepth 0 always returns 0 without drawing", () => {
    expect(selectDepth(brokenRandom(), 0)).toBe(0);
  });

  it("lowest draw picks the nearest layer", () => {
    expect(selectDepth(lowRandom(), 3)).toBe(0);
  });

  it("highest draw picks the deepest weighted layer", () => {
    // weights 3, 2, 1, 0: cumulative 3, 5, 6; draw 5 lands on layer 2
    expect(selectDepth(highRandom(), 3)).toBe(2);
  });

  it("deepest layer has weight 0", () => {
    expect(layerWeight(4, 4)).toBe(0);
    expect(layerWeight(0, 4)).toBe(4);
  });

  it("maxDepth 1 always picks layer 0", () => {
    const counts = histogram(1, 10000, 42);
    expect(counts[0]).toBe(10000);
    expect(counts[1]).toBe(0);
    expect(counts[0]).toBeGreaterThan(counts[1]);
  });

  it("favours shallow layers", () => {
    const counts = histogram(3, 10000, 42);
    expect(counts[0]).toBeGreaterThan(counts[1]);
    expect(counts[1]).toBeGreaterThan(counts[2]);
    expect(counts[3]).toBe(0);
  });

  it("results stay in range", () => {
    const random = createRandom(3);
    for (let i = 0; i < 1000; i++) {
      const d = selectDepth(random, 9);
      expect(d).toBeGreaterThanOrEqual(0);
      expect(d).toBeLessThanOrEqual(9);
    }
  });
});
