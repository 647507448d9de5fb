import type { Random } from "./rain/random.js";
import type { RainSettings } from "./rain/types.js";
import type { FrameSink, RainContext } from "./loop/loop.js";
import { Screen } from "./rain/screen.js";
import { ScreenSlot } from "./loop/slot.js";
import { runLoop } from "./loop/loop.js";

/**
 * Owns everything one animation run shares: the random source, the screen
 * slot and the stop signal. The render loop reads them through the context;
 * resize and stop requests come in through the controller.
 */
export class RainController {
  readonly context: RainContext;
  private readonly abort = new AbortController();
  private loop: Promise<number> | null = null;

  constructor(
    private readonly sink: FrameSink,
    settings: RainSettings,
    random: Random,
    size: { width: number; height: number },
    private readonly delayMs: number,
  ) {
    this.context = {
      random,
      settings,
      slot: new ScreenSlot(new Screen(size.width, size.height)),
      signal: this.abort.signal,
    };
  }

  get running(): boolean {
    return this.loop !== null && !this.abort.signal.aborted;
  }

  get screen(): Screen {
    return this.context.slot.screen;
  }

  /** Starts the loop; the promise settles when it exits. */
  start(): Promise<number> {
    if (!this.loop) {
      this.loop = runLoop(this.context, this.sink, this.delayMs);
    }
    return this.loop;
  }

  /** Drops all strings and continues on an empty screen of the new size. */
  resize(width: number, height: number): void {
    this.context.slot.replace(Screen.resize(width, height));
  }

  /** Signals the loop to exit after the tick in flight. */
  requestStop(): void {
    this.abort.abort();
  }
}
