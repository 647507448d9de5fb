import type { Random } from "./random.js";
import type { RainSettings } from "./types.js";
import { selectDepth } from "./depth.js";
import { lengthFor, startYFor } from "./params.js";
import { randomSymbol } from "./symbols.js";

/**
 * One falling run of characters. `y` is the row of the leading (newest)
 * symbol at index 0; the symbol at index i sits on row `y - i`.
 */
export class RainString {
  readonly length: number;

  private constructor(
    private readonly cells: string[],
    readonly depth: number,
    private tick: number,
    private row: number,
  ) {
    this.length = cells.length;
  }

  get symbols(): readonly string[] {
    return this.cells;
  }

  /** In [0, depth]; the string moves when it wraps to 0. */
  get clock(): number {
    return this.tick;
  }

  get y(): number {
    return this.row;
  }

  static create(random: Random, settings: RainSettings): RainString {
    const { maxDepth, limits } = settings;
    const depth = selectDepth(random, maxDepth);
    const length = lengthFor(random, depth, maxDepth, settings.length, limits);
    const y = startYFor(random, depth, maxDepth, settings.air, limits);
    const clock = settings.async ? random.int(0, depth) : 0;
    const symbols = Array.from({ length }, () => randomSymbol(random));
    return new RainString(symbols, depth, clock, y);
  }

  static of(symbols: readonly string[], depth: number, y: number, clock = 0): RainString {
    return new RainString([...symbols], depth, clock % (depth + 1), y);
  }

  /**
   * Steps the internal clock. Only when it wraps to 0 does the string move:
   * deeper strings wrap less often and so fall slower.
   *
   * Returns true if the string moved.
   */
  advance(random: Random, old = false): boolean {
    this.tick = (this.tick + 1) % (this.depth + 1);
    if (this.tick !== 0) {
      return false;
    }

    this.row += 1;
    if (old) {
      return true;
    }

    for (let i = this.cells.length - 1; i > 0; i--) {
      this.cells[i] = this.cells[i - 1];
    }
    this.cells[0] = randomSymbol(random);
    return true;
  }

  /** Trailing edge has left the bottom of a viewport `height` rows tall. */
  isExhausted(height: number): boolean {
    return this.y - this.length >= height;
  }

  /** Trailing edge has passed row 0. */
  isEmerged(): boolean {
    return this.y - this.length > 0;
  }
}
