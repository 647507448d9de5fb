import fs from "fs";
import path from "path";
import os from "os";
import { parse } from "smol-toml";
import { rainOptionsSchema, type RainOptions } from "../validation.js";

export type Config = RainOptions;

const DEFAULTS: Config = {
  speed: 4,
  depth: 3,
  length: 5,
  air: 5,
  typing: false,
  async: false,
  old: false,
};

export function defaultConfig(): Config {
  return { ...DEFAULTS };
}

export function getConfigPath(): string {
  if (process.env.DEPTHRAIN_CONFIG_DIR) {
    return path.join(process.env.DEPTHRAIN_CONFIG_DIR, "config.toml");
  }
  return path.join(os.homedir(), ".depthrain", "config.toml");
}

export const DEFAULT_CONFIG_TOML = `# depthrain configuration
# Command-line flags override every value here.

# Scroll speed, 1 (slowest) to 10 (fastest)
speed = 4

# Deepest layer, 0 to 9. Strings spread over layers 0..depth;
# deeper layers fall slower, are shorter and dimmer.
depth = 3

# Length of strings, 1 (short) to 10 (long)
length = 5

# Space between strings in a column, 1 (dense) to 10 (sparse)
air = 5

# Only "q" or Ctrl+C exit when true; otherwise any key exits
typing = false

# Start strings at random phases so layers do not step in lockstep
async = false

# Move strings as a block instead of cycling symbols under the head
old = false
`;

export function loadConfig(configPath?: string): Config {
  const resolved = configPath ?? getConfigPath();

  if (!fs.existsSync(resolved)) {
    return defaultConfig();
  }

  const raw = fs.readFileSync(resolved, "utf-8");
  let parsed;
  try {
    parsed = parse(raw);
  } catch (err) {
    process.stderr.write(
      `Warning: Could not parse config file at ${resolved}: ${err instanceof Error ? err.message : String(err)}. Using defaults.\n`,
    );
    return defaultConfig();
  }

  // Each key is checked on its own so one bad value keeps the rest.
  const config = defaultConfig();
  const shape = rainOptionsSchema.shape;

  const speed = shape.speed.safeParse(parsed.speed);
  if (speed.success) {
    config.speed = speed.data;
  }

  const depth = shape.depth.safeParse(parsed.depth);
  if (depth.success) {
    config.depth = depth.data;
  }

  const length = shape.length.safeParse(parsed.length);
  if (length.success) {
    config.length = length.data;
  }

  const air = shape.air.safeParse(parsed.air);
  if (air.success) {
    config.air = air.data;
  }

  if (typeof parsed.typing === "boolean") {
    config.typing = parsed.typing;
  }

  if (typeof parsed.async === "boolean") {
    config.async = parsed.async;
  }

  if (typeof parsed.old === "boolean") {
    config.old = parsed.old;
  }

  return config;
}
