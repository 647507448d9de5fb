#!/usr/bin/env node
import { fileURLToPath } from "url";
import fs from "fs";
import path from "path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { z } from "zod";
import { RainController } from "./main.js";
import { loadConfig, getConfigPath, DEFAULT_CONFIG_TOML, type Config } from "./config/config.js";
import {
  airSchema,
  depthSchema,
  lengthSchema,
  parseIntOption,
  seedSchema,
  sizeSchema,
  speedSchema,
  ticksSchema,
  type RainOptions,
} from "./validation.js";
import { createRandom, defaultSeed } from "./rain/random.js";
import { DEFAULT_LIMITS, type RainSettings } from "./rain/types.js";
import { Screen } from "./rain/screen.js";
import { Frame } from "./format/frame.js";
import { tickDelay } from "./loop/loop.js";
import { NodeTerminal } from "./terminal/terminal.js";
import { listenForExit } from "./terminal/input.js";
import { UpdateFailedError } from "./errors.js";
import { bold, red } from "./format/colors.js";
import { VERSION } from "./version.js";

export interface RunOptions extends RainOptions {
  seed: number;
}

export type Runner = (options: RunOptions) => Promise<void>;

interface RainFlags {
  speed?: number;
  depth?: number;
  length?: number;
  air?: number;
  typing?: boolean;
  async?: boolean;
  old?: boolean;
  seed?: number;
}

function intArg(schema: z.ZodType<number>): (raw: string) => number {
  return (raw) => {
    const result = parseIntOption(raw, schema);
    if (!result.valid) {
      throw new InvalidArgumentError(result.message);
    }
    return result.value;
  };
}

function addRainOptions(cmd: Command): Command {
  return cmd
    .option("-s, --speed <n>", "Scroll speed, 1-10", intArg(speedSchema))
    .option("-d, --depth <n>", "Deepest layer, 0-9", intArg(depthSchema))
    .option("-l, --length <n>", "String length ratio, 1-10", intArg(lengthSchema))
    .option("-a, --air <n>", "Spacing between strings, 1-10", intArg(airSchema))
    .option("-t, --typing", "Only 'q' or Ctrl+C exit (default: any key)")
    .option("--no-typing", "Any key exits, even if the config sets typing")
    .option("--async", "Asynchronous scroll")
    .option("--no-async", "Synchronous scroll")
    .option("--old", "Old-style scroll: strings move as a block")
    .option("--no-old", "Symbols shift down the string as it falls")
    .option("--seed <n>", "Seed for the random source", intArg(seedSchema));
}

/** Flags win over the config file. */
export function resolveOptions(flags: RainFlags, config: Config): RunOptions {
  return {
    speed: flags.speed ?? config.speed,
    depth: flags.depth ?? config.depth,
    length: flags.length ?? config.length,
    air: flags.air ?? config.air,
    typing: flags.typing ?? config.typing,
    async: flags.async ?? config.async,
    old: flags.old ?? config.old,
    seed: flags.seed ?? defaultSeed(),
  };
}

/**
 * `depth` names the deepest layer drawn. The selector never draws layer
 * `maxDepth` itself (its weight is 0), so the bound sits one past it.
 */
export function toRainSettings(options: RainOptions): RainSettings {
  return {
    maxDepth: options.depth + 1,
    length: options.length,
    air: options.air,
    async: options.async,
    old: options.old,
    limits: DEFAULT_LIMITS,
  };
}

/** Runs the core headless for `ticks` ticks and returns the last frame. */
export function renderPreview(
  options: RunOptions,
  width: number,
  height: number,
  ticks: number,
): Frame {
  const random = createRandom(options.seed);
  const settings = toRainSettings(options);
  const screen = new Screen(width, height);
  for (let i = 0; i < ticks; i++) {
    screen.update(random, settings);
  }
  const frame = new Frame(width, height);
  screen.render(frame.draw);
  return frame;
}

/** Full-screen animation on the process's TTY until a key or signal stops it. */
export async function runAnimation(options: RunOptions): Promise<void> {
  const terminal = new NodeTerminal();
  const controller = new RainController(
    terminal,
    toRainSettings(options),
    createRandom(options.seed),
    { width: terminal.columns, height: terminal.rows },
    tickDelay(options.speed),
  );

  const onSignal = () => controller.requestStop();
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  terminal.enter();
  const stopResize = terminal.onResize((columns, rows) => controller.resize(columns, rows));
  const stopInput = listenForExit(process.stdin, options.typing, onSignal);

  try {
    await controller.start();
  } finally {
    stopInput();
    stopResize();
    terminal.leave();
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

export function createProgram(
  run: Runner = runAnimation,
  write: (text: string) => void = (t) => process.stdout.write(t + "\n"),
  config?: Config,
): Command {
  const resolvedConfig = config ?? loadConfig();
  const program = new Command("depthrain")
    .description(
      "depthrain — falling-character animation with depth layers\n\nPress any key to exit (or only 'q' with --typing). Run 'depthrain config init' to create a config file.",
    )
    .version(VERSION);

  program.configureOutput({
    writeOut: write,
    writeErr: write,
  });

  // Override exit to not actually exit during tests
  program.exitOverride();

  // Rain options after "preview" belong to preview, not the root command.
  program.enablePositionalOptions();

  addRainOptions(program).action(async (opts: RainFlags) => {
    await run(resolveOptions(opts, resolvedConfig));
  });

  // preview
  addRainOptions(
    program
      .command("preview")
      .description("Print a frame as plain text after running the animation headless")
      .option("--ticks <n>", "Ticks to run before printing", intArg(ticksSchema), 60)
      .option("--width <n>", "Columns", intArg(sizeSchema), 40)
      .option("--height <n>", "Rows", intArg(sizeSchema), 12),
  ).action((opts: RainFlags & { ticks: number; width: number; height: number }) => {
    const options = resolveOptions(opts, resolvedConfig);
    const frame = renderPreview(options, opts.width, opts.height, opts.ticks);
    write(frame.toText());
  });

  // config
  const configCmd = program.command("config").description("Manage configuration");

  configCmd
    .command("init")
    .description("Create a default config file with documented options")
    .action(() => {
      const configPath = getConfigPath();
      if (fs.existsSync(configPath)) {
        write(`Config file already exists at ${configPath}`);
        return;
      }
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, DEFAULT_CONFIG_TOML);
      write(`Created ${configPath}`);
    });

  configCmd
    .command("path")
    .description("Print the config file path")
    .action(() => {
      write(getConfigPath());
    });

  return program;
}

// Entry point when run directly
async function main() {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    // Commander throws on --help, --version, etc.
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    throw err;
  }
}

// npm links bin entries, so compare resolved paths.
const currentFile = fileURLToPath(import.meta.url);
const isEntryPoint =
  process.argv[1] !== undefined &&
  fs.existsSync(process.argv[1]) &&
  fs.realpathSync(process.argv[1]) === fs.realpathSync(currentFile);

if (isEntryPoint) {
  main().catch((err) => {
    if (err instanceof UpdateFailedError) {
      process.stderr.write(`${bold(red("error:"))} ${err.message}\n`);
    } else {
      console.error(err);
    }
    process.exit(1);
  });
}
