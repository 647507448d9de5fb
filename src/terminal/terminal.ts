import ansiEscapes from "ansi-escapes";
import type { FrameSink } from "../loop/loop.js";
import type { Frame } from "../format/frame.js";
import { isColorEnabled } from "../format/colors.js";

const FALLBACK_COLUMNS = 80;
const FALLBACK_ROWS = 24;

export interface TerminalSurface extends FrameSink {
  readonly columns: number;
  readonly rows: number;
  enter(): void;
  leave(): void;
  /** Calls `listener` with the new size on every resize; returns an unsubscribe. */
  onResize(listener: (columns: number, rows: number) => void): () => void;
}

/** The parts of a TTY write stream the terminal uses. */
export interface TerminalOutput {
  readonly columns?: number;
  readonly rows?: number;
  write(data: string): unknown;
  on(event: "resize", listener: () => void): unknown;
  off(event: "resize", listener: () => void): unknown;
}

/** A TTY driven with plain ANSI sequences on an output stream. */
export class NodeTerminal implements TerminalSurface {
  constructor(
    private readonly output: TerminalOutput = process.stdout,
    private readonly color: boolean = isColorEnabled(),
  ) {}

  get columns(): number {
    return this.output.columns ?? FALLBACK_COLUMNS;
  }

  get rows(): number {
    return this.output.rows ?? FALLBACK_ROWS;
  }

  enter(): void {
    this.output.write(
      ansiEscapes.enterAlternativeScreen + ansiEscapes.cursorHide + ansiEscapes.eraseScreen,
    );
  }

  leave(): void {
    this.output.write(ansiEscapes.cursorShow + ansiEscapes.exitAlternativeScreen);
  }

  present(frame: Frame): void {
    this.output.write(frame.toAnsi(this.color));
  }

  onResize(listener: (columns: number, rows: number) => void): () => void {
    const handler = () => listener(this.columns, this.rows);
    this.output.on("resize", handler);
    return () => {
      this.output.off("resize", handler);
    };
  }
}
