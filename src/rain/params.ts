import type { Random } from "./random.js";
import type { RainLimits } from "./types.js";

/** 1 for the nearest layer, falling to 0 at maxDepth. */
export function depthRatio(depth: number, maxDepth: number): number {
  if (maxDepth <= 0) {
    return 1;
  }
  return (maxDepth - depth) / maxDepth;
}

function scale(min: number, max: number, ratio: number): number {
  return min + ratio * (max - min);
}

/** Upper bound of a string's length at this depth. */
export function maxLengthFor(
  depth: number,
  maxDepth: number,
  lengthSetting: number,
  limits: RainLimits,
): number {
  const ratio = (lengthSetting / 10) * depthRatio(depth, maxDepth);
  return Math.floor(scale(limits.minLength, limits.maxLength, ratio));
}

export function lengthFor(
  random: Random,
  depth: number,
  maxDepth: number,
  lengthSetting: number,
  limits: RainLimits,
): number {
  return random.int(limits.minLength, maxLengthFor(depth, maxDepth, lengthSetting, limits));
}

/** How far above row 0 a string at this depth may spawn. */
export function maxSpanFor(
  depth: number,
  maxDepth: number,
  airSetting: number,
  limits: RainLimits,
): number {
  const ratio = (airSetting / 10) * depthRatio(depth, maxDepth);
  return Math.floor(scale(limits.maxLength, limits.maxLength * 6, ratio));
}

export function startYFor(
  random: Random,
  depth: number,
  maxDepth: number,
  airSetting: number,
  limits: RainLimits,
): number {
  return 0 - random.int(0, maxSpanFor(depth, maxDepth, airSetting, limits));
}
