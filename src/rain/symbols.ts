import type { Random } from "./random.js";

const FIRST_PRINTABLE = 0x21; // "!"
const LAST_PRINTABLE = 0x7e; // "~"

export function randomSymbol(random: Random): string {
  return String.fromCharCode(random.int(FIRST_PRINTABLE, LAST_PRINTABLE));
}
