import ansiEscapes from "ansi-escapes";
import type { DrawFn } from "../rain/types.js";
import { terminalColor } from "../rain/color.js";
import { FG_DEFAULT, fg256Open } from "./colors.js";

export interface Cell {
  symbol: string;
  color: number;
}

/**
 * One rendered tick: the draw calls of a screen collected into a grid.
 * Later draws to the same cell win.
 */
export class Frame {
  private readonly cells: (Cell | null)[];

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.cells = new Array<Cell | null>(Math.max(0, width * height)).fill(null);
  }

  draw: DrawFn = (x, y, symbol, colorIndex) => {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      return;
    }
    this.cells[y * this.width + x] = { symbol, color: colorIndex };
  };

  at(x: number, y: number): Cell | null {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      return null;
    }
    return this.cells[y * this.width + x] ?? null;
  }

  get drawn(): number {
    return this.cells.filter((c) => c !== null).length;
  }

  /** Rows as plain text, trailing blanks trimmed. */
  toText(): string {
    const lines: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let line = "";
      for (let x = 0; x < this.width; x++) {
        line += this.at(x, y)?.symbol ?? " ";
      }
      lines.push(line.trimEnd());
    }
    return lines.join("\n");
  }

  /**
   * Every row repainted in full from column 0, so cells left over from the
   * previous frame are overwritten with blanks.
   */
  toAnsi(color: boolean): string {
    let out = "";
    for (let y = 0; y < this.height; y++) {
      out += ansiEscapes.cursorTo(0, y);
      let active = -1;
      for (let x = 0; x < this.width; x++) {
        const cell = this.at(x, y);
        if (!cell) {
          out += " ";
          continue;
        }
        if (color) {
          const code = terminalColor(cell.color);
          if (code !== active) {
            out += fg256Open(code);
            active = code;
          }
        }
        out += cell.symbol;
      }
      if (active !== -1) {
        out += FG_DEFAULT;
      }
    }
    return out;
  }
}
