import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig, resolveManifestDir } from "../../src/config/loader.js";
import { ParseError } from "../../src/errors.js";
import { cleanupTempDirs, makeTempDir, writeText } from "../helpers.js";

afterEach(() => {
  cleanupTempDirs();
});

function writeConfig(dir: string, value: unknown): void {
  writeText(join(dir, ".manifesto.json"), JSON.stringify(value));
}

describe("loadConfig", () => {
  it("returns defaults when .manifesto.json is missing", () => {
    expect(loadConfig(makeTempDir())).toEqual({
      manifestDir: "docs/_MANIFESTO",
      testRunner: "swift",
      commandTimeoutMs: 30_000,
      testTimeoutMs: 60_000,
      limits: { maxTasks: 8, maxDescriptionWords: 12, maxDescriptionLength: 120 },
    });
  });

  it("merges partial settings over defaults", () => {
    const dir = makeTempDir();
    writeConfig(dir, { manifestDir: "manifest", limits: { maxTasks: 5 } });

    const config = loadConfig(dir);

    expect(config.manifestDir).toBe("manifest");
    expect(config.testRunner).toBe("swift");
    expect(config.limits).toEqual({ maxTasks: 5, maxDescriptionWords: 12, maxDescriptionLength: 120 });
  });

  it("accepts a shell runner with a command", () => {
    const dir = makeTempDir();
    writeConfig(dir, { testRunner: "shell", testCommand: "pytest -k {selector}" });

    const config = loadConfig(dir);
    expect(config.testRunner).toBe("shell");
    expect(config.testCommand).toBe("pytest -k {selector}");
  });

  it("rejects a shell runner without a command", () => {
    const dir = makeTempDir();
    writeConfig(dir, { testRunner: "shell" });

    expect(() => loadConfig(dir)).toThrow('testCommand: testRunner "shell" requires testCommand');
  });

  it("rejects an unknown runner", () => {
    const dir = makeTempDir();
    writeConfig(dir, { testRunner: "maven" });
    expect(() => loadConfig(dir)).toThrow(ParseError);
  });

  it("rejects malformed JSON", () => {
    const dir = makeTempDir();
    writeText(join(dir, ".manifesto.json"), "{ nope");
    expect(() => loadConfig(dir)).toThrow(ParseError);
  });
});

describe("resolveManifestDir", () => {
  it("resolves relative to the project directory", () => {
    const dir = makeTempDir();
    expect(resolveManifestDir(dir, loadConfig(dir))).toBe(join(dir, "docs", "_MANIFESTO"));
  });
});
