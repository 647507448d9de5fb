import { setTimeout as sleep } from "timers/promises";
import type { Random } from "../rain/random.js";
import type { RainSettings } from "../rain/types.js";
import type { ScreenSlot } from "./slot.js";
import { Frame } from "../format/frame.js";

export const MIN_DELAY_MS = 10;
export const MAX_DELAY_MS = 100;

/** Milliseconds between ticks for speed 1..10; faster speed, shorter delay. */
export function tickDelay(speed: number): number {
  return MIN_DELAY_MS + (1 - speed / 10) * (MAX_DELAY_MS - MIN_DELAY_MS);
}

export interface RainContext {
  random: Random;
  settings: RainSettings;
  slot: ScreenSlot;
  signal: AbortSignal;
}

export interface FrameSink {
  present(frame: Frame): void;
}

/** One tick: update the current screen, render it and hand the frame on. */
export function tick(ctx: RainContext, sink: FrameSink): void {
  ctx.slot.use((screen) => {
    screen.update(ctx.random, ctx.settings);
    const frame = new Frame(screen.width, screen.height);
    screen.render(frame.draw);
    sink.present(frame);
  });
}

/**
 * Ticks until the context's signal aborts. The tick in flight when the
 * abort lands is finished; the sleep after it is cut short. An update
 * failure ends the loop and rejects. Resolves with the number of ticks run.
 */
export async function runLoop(ctx: RainContext, sink: FrameSink, delayMs: number): Promise<number> {
  let ticks = 0;
  while (!ctx.signal.aborted) {
    tick(ctx, sink);
    ticks++;
    try {
      await sleep(delayMs, undefined, { signal: ctx.signal });
    } catch (err) {
      if (ctx.signal.aborted) {
        break;
      }
      throw err;
    }
  }
  return ticks;
}
