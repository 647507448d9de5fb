/**
 * Minimal ANSI color/style module.
 *
 * - Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * - Falls back to process.stdout.isTTY detection.
 * - Uses per-attribute close codes so styles can be nested:
 *     bold(red("hi"))  →  \x1b[1m\x1b[31mhi\x1b[39m\x1b[22m
 */

export function isColorEnabled(): boolean {
  if ("NO_COLOR" in process.env) {
    return false;
  }
  if ("FORCE_COLOR" in process.env) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

type StyleFn = (text: string) => string;

function make(open: number, close: number): StyleFn {
  const o = `\x1b[${open}m`;
  const c = `\x1b[${close}m`;
  return (t) => (isColorEnabled() ? `${o}${t}${c}` : t);
}

export const bold = make(1, 22);
export const red = make(31, 39);

export const FG_DEFAULT = "\x1b[39m";

/** Opening SGR sequence for an xterm 256-colour foreground. */
export function fg256Open(code: number): string {
  return `\x1b[38;5;${code}m`;
}
