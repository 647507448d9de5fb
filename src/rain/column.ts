import type { Random } from "./random.js";
import type { DrawFn, RainSettings } from "./types.js";
import { RainString } from "./string.js";
import { colorIndex } from "./color.js";

export interface ColumnChange {
  appended: boolean;
  removed: boolean;
}

export class Column {
  private readonly strings: RainString[] = [];

  get count(): number {
    return this.strings.length;
  }

  /** Strings oldest first. */
  get entries(): readonly RainString[] {
    return this.strings;
  }

  push(string: RainString): void {
    this.strings.push(string);
  }

  update(random: Random, settings: RainSettings, height: number): ColumnChange {
    for (const string of this.strings) {
      string.advance(random, settings.old);
    }

    if (this.strings.length === 0) {
      this.strings.push(RainString.create(random, settings));
      return { appended: true, removed: false };
    }

    let appended = false;
    const newest = this.strings[this.strings.length - 1];
    if (newest.isEmerged()) {
      this.strings.push(RainString.create(random, settings));
      appended = true;
    }

    let removed = false;
    if (this.strings[0].isExhausted(height)) {
      this.strings.shift();
      removed = true;
    }

    return { appended, removed };
  }

  render(x: number, height: number, draw: DrawFn): void {
    for (const string of this.strings) {
      const { symbols, depth, length } = string;
      for (let i = 0; i < length; i++) {
        const y = string.y - i;
        if (y < 0 || y >= height) {
          continue;
        }
        draw(x, y, symbols[i], colorIndex(depth, i, length));
      }
    }
  }
}
