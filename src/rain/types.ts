export interface RainLimits {
  minLength: number;
  maxLength: number;
}

export const DEFAULT_LIMITS: RainLimits = {
  minLength: 4,
  maxLength: 30,
};

/** Number of depth layers the palette has colours for. */
export const NUM_DEPTHS = 10;
export const MAX_DEPTH = NUM_DEPTHS - 1;

/**
 * Settings the animation core reads. Values are range-checked before they
 * get here (see validation.ts); the core trusts them.
 */
export interface RainSettings {
  /**
   * Depth bound, 0..NUM_DEPTHS. Layer maxDepth weighs 0, so strings use
   * layers 0..maxDepth-1, or layer 0 alone when maxDepth is 0.
   */
  maxDepth: number;
  /** Global length ratio, 1..10. */
  length: number;
  /** Global spacing ratio, 1..10. */
  air: number;
  /** Start each string's clock at a random phase. */
  async: boolean;
  /** Move strings as a block instead of cycling symbols under a fixed head. */
  old: boolean;
  limits: RainLimits;
}

export type DrawFn = (x: number, y: number, symbol: string, colorIndex: number) => void;
