import readline from "readline";

export const QUIT_KEY = "q";

/**
 * Whether a key ends the animation. Ctrl+C always does; otherwise any key
 * does unless `typing` is on, in which case only the quit key does.
 */
export function shouldExit(key: readline.Key, typing: boolean): boolean {
  if (key.ctrl && key.name === "c") {
    return true;
  }
  if (!typing) {
    return true;
  }
  return key.name === QUIT_KEY && !key.ctrl && !key.meta;
}

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/**
 * Puts `input` in raw mode and calls `onExit` for every key that ends
 * the animation. Returns a function restoring the stream.
 */
export function listenForExit(
  input: KeyInput,
  typing: boolean,
  onExit: () => void,
): () => void {
  readline.emitKeypressEvents(input);
  const wasRaw = input.isRaw ?? false;
  if (input.isTTY) {
    input.setRawMode?.(true);
  }

  const handler = (str: string | undefined, key: readline.Key | undefined) => {
    if (shouldExit(key ?? { sequence: str }, typing)) {
      onExit();
    }
  };
  input.on("keypress", handler);
  input.resume();

  return () => {
    input.off("keypress", handler);
    if (input.isTTY) {
      input.setRawMode?.(wasRaw);
    }
    input.pause();
  };
}
