import type { Random } from "./random.js";
import type { DrawFn, RainSettings } from "./types.js";
import { Column } from "./column.js";
import { UpdateFailedError } from "../errors.js";

export class Screen {
  readonly columns: Column[];

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.columns = Array.from({ length: Math.max(0, width) }, () => new Column());
  }

  /** A fresh, empty screen; nothing carries over from the old one. */
  static resize(width: number, height: number): Screen {
    return new Screen(width, height);
  }

  update(random: Random, settings: RainSettings): void {
    for (let x = 0; x < this.columns.length; x++) {
      try {
        this.columns[x].update(random, settings, this.height);
      } catch (err) {
        throw new UpdateFailedError(x, err);
      }
    }
  }

  render(draw: DrawFn): void {
    for (let x = 0; x < this.columns.length; x++) {
      this.columns[x].render(x, this.height, draw);
    }
  }
}
