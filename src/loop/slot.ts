import type { Screen } from "../rain/screen.js";
import { SlotBusyError } from "../errors.js";

/**
 * Holds the current screen. A pass (update + render + flush) runs inside
 * `use`; a `replace` arriving while a pass holds the slot is applied when
 * the pass releases it, so a screen is never swapped out mid-pass.
 */
export class ScreenSlot {
  private current: Screen;
  private pending: Screen | null = null;
  private held = false;

  constructor(screen: Screen) {
    this.current = screen;
  }

  get screen(): Screen {
    return this.current;
  }

  get busy(): boolean {
    return this.held;
  }

  use<T>(fn: (screen: Screen) => T): T {
    if (this.held) {
      throw new SlotBusyError();
    }
    this.held = true;
    try {
      return fn(this.current);
    } finally {
      this.held = false;
      if (this.pending) {
        this.current = this.pending;
        this.pending = null;
      }
    }
  }

  replace(screen: Screen): void {
    if (this.held) {
      this.pending = screen;
      return;
    }
    this.current = screen;
  }
}
