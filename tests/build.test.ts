import { describe, it, expect } from "vitest";
import fs from "fs";
import config from "../tsup.config.js";

const pkg: { version: string; scripts: Record<string, string> } = JSON.parse(
  fs.readFileSync("package.json", "utf-8"),
);

describe("build", () => {
  it("builds the CLI with tsup", () => {
    expect(pkg.scripts.build).toBe("tsup");
  });

  it("defines the package version for the bundled CLI", () => {
    if (typeof config === "function" || Array.isArray(config)) {
      throw new Error("expected a single tsup options object");
    }
    expect(config.entry).toEqual(["src/cli.ts"]);
    expect(config.define).toEqual({ __VERSION__: JSON.stringify(pkg.version) });
  });
});
