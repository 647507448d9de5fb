import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { parse } from "smol-toml";
import {
  getConfigPath,
  loadConfig,
  defaultConfig,
  DEFAULT_CONFIG_TOML,
} from "../../src/config/config.js";

const DEFAULTS = {
  speed: 4,
  depth: 3,
  length: 5,
  air: 5,
  typing: false,
  async: false,
  old: false,
};

describe("config", () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "depthrain-config-test-"));
    configPath = path.join(tmpDir, "config.toml");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true });
    vi.restoreAllMocks();
  });

  it("returns defaults when file does not exist", () => {
    expect(loadConfig(path.join(tmpDir, "nonexistent.toml"))).toEqual(DEFAULTS);
  });

  it("returns defaults for empty file", () => {
    fs.writeFileSync(configPath, "");
    expect(loadConfig(configPath)).toEqual(DEFAULTS);
  });

  it("defaultConfig returns a fresh copy", () => {
    const a = defaultConfig();
    a.speed = 9;
    expect(defaultConfig().speed).toBe(4);
  });

  it("parses every option", () => {
    fs.writeFileSync(
      configPath,
      "speed = 9\ndepth = 6\nlength = 2\nair = 8\ntyping = true\nasync = true\nold = true\n",
    );
    expect(loadConfig(configPath)).toEqual({
      speed: 9,
      depth: 6,
      length: 2,
      air: 8,
      typing: true,
      async: true,
      old: true,
    });
  });

  it("ignores out-of-range numbers", () => {
    fs.writeFileSync(configPath, "speed = 11\ndepth = 10\nlength = 0\nair = -1\n");
    expect(loadConfig(configPath)).toEqual(DEFAULTS);
  });

  it("ignores non-integer numbers", () => {
    fs.writeFileSync(configPath, "speed = 2.5\n");
    expect(loadConfig(configPath).speed).toBe(4);
  });

  it("ignores wrongly typed values", () => {
    fs.writeFileSync(configPath, 'speed = "fast"\ntyping = "yes"\nold = 1\n');
    expect(loadConfig(configPath)).toEqual(DEFAULTS);
  });

  it("keeps valid keys next to invalid ones", () => {
    fs.writeFileSync(configPath, "speed = 11\nair = 2\n");
    const config = loadConfig(configPath);
    expect(config.speed).toBe(4);
    expect(config.air).toBe(2);
  });

  it("warns and falls back to defaults on a parse error", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    fs.writeFileSync(configPath, "speed = = 3\n");

    expect(loadConfig(configPath)).toEqual(DEFAULTS);
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toContain(
      `Warning: Could not parse config file at ${configPath}`,
    );
  });

  it("the documented default file matches the defaults", () => {
    expect(parse(DEFAULT_CONFIG_TOML)).toEqual(DEFAULTS);
    fs.writeFileSync(configPath, DEFAULT_CONFIG_TOML);
    expect(loadConfig(configPath)).toEqual(DEFAULTS);
  });
});

describe("getConfigPath", () => {
  const saved = process.env.DEPTHRAIN_CONFIG_DIR;

  afterEach(() => {
    if (saved !== undefined) {
      process.env.DEPTHRAIN_CONFIG_DIR = saved;
    } else {
      delete process.env.DEPTHRAIN_CONFIG_DIR;
    }
  });

  it("uses DEPTHRAIN_CONFIG_DIR when set", () => {
    process.env.DEPTHRAIN_CONFIG_DIR = "/tmp/depthrain-test";
    expect(getConfigPath()).toBe(path.join("/tmp/depthrain-test", "config.toml"));
  });

  it("defaults to ~/.depthrain/config.toml", () => {
    delete process.env.DEPTHRAIN_CONFIG_DIR;
    expect(getConfigPath()).toBe(path.join(os.homedir(), ".depthrain", "config.toml"));
  });
});
