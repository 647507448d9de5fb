import { NUM_DEPTHS } from "./types.js";

export const SHADES_PER_DEPTH = 7;
export const PALETTE_SIZE = NUM_DEPTHS * SHADES_PER_DEPTH;

const BRIGHTEST = 0;
const SECOND_BRIGHTEST = 1;
const DIMMEST = SHADES_PER_DEPTH - 1;

/**
 * Palette index for symbol `index` of a string at `depth`. Each depth owns
 * a block of SHADES_PER_DEPTH shades; the leading symbol takes the
 * brightest, the tail fades from the second brightest to the dimmest.
 */
export function colorIndex(depth: number, index: number, length: number): number {
  const base = depth * SHADES_PER_DEPTH;
  if (index === 0) {
    return base + BRIGHTEST;
  }
  const ratio = index / length;
  const shade = SECOND_BRIGHTEST + Math.round(ratio * (DIMMEST - SECOND_BRIGHTEST));
  return base + Math.min(DIMMEST, Math.max(SECOND_BRIGHTEST, shade));
}

// xterm 256-colour cube: 16 + 36r + 6g + b, each channel 0..5.
function cube(r: number, g: number, b: number): number {
  return 16 + 36 * r + 6 * g + b;
}

/** xterm 256-colour code for a palette index. */
export function terminalColor(paletteIndex: number): number {
  const depth = Math.floor(paletteIndex / SHADES_PER_DEPTH);
  const shade = paletteIndex % SHADES_PER_DEPTH;
  // 1 for the nearest layer down to 0.4 for the deepest.
  const nearness = 1 - (0.6 * depth) / (NUM_DEPTHS - 1);

  if (shade === BRIGHTEST) {
    const head = Math.max(1, Math.round(5 * nearness));
    return cube(Math.max(0, head - 2), head, Math.max(0, head - 2));
  }

  const fade = 1 - (shade - SECOND_BRIGHTEST) / (DIMMEST - SECOND_BRIGHTEST + 1);
  const green = Math.max(1, Math.round(5 * nearness * fade));
  return cube(0, green, 0);
}
