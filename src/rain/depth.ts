import type { Random } from "./random.js";

/**
 * Picks a depth layer in [0, maxDepth] with a triangular weighting: layer d
 * weighs (maxDepth - d), so the nearest layer is most likely and the
 * deepest layer weighs 0. With maxDepth 0 there is only layer 0.
 */
export function selectDepth(random: Random, maxDepth: number): number {
  if (maxDepth <= 0) {
    return 0;
  }

  let total = 0;
  for (let d = 0; d <= maxDepth; d++) {
    total += layerWeight(d, maxDepth);
  }

  const draw = random.int(0, total - 1);

  let cumulative = 0;
  for (let d = 0; d <= maxDepth; d++) {
    cumulative += layerWeight(d, maxDepth);
    if (cumulative > draw) {
      return d;
    }
  }
  return maxDepth;
}

export function layerWeight(depth: number, maxDepth: number): number {
  return maxDepth - depth;
}
