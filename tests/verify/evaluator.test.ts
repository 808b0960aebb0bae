import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { allPassed, evaluateAcceptance, verifyTask } from "../../src/verify/evaluator.js";
import type { TestRunner } from "../../src/types.js";
import { cleanupTempDirs, makeTempDir, writeText } from "../helpers.js";

afterEach(() => {
  cleanupTempDirs();
});

function fakeRunner(passed: boolean, output: string): TestRunner & { selectors: string[] } {
  const selectors: string[] = [];
  return {
    name: "fake",
    selectors,
    runTests(selector) {
      selectors.push(selector);
      return { passed, output };
    },
  };
}

describe("evaluateAcceptance", () => {
  it("passes vacuously with no criteria", () => {
    expect(evaluateAcceptance({ acceptance: {} })).toEqual({ passed: true, results: {} });
  });

  it("records nothing for performance targets", () => {
    const outcome = evaluateAcceptance({ acceptance: { performance_metric: { fps: 90 } } });
    expect(outcome).toEqual({ passed: true, results: {} });
  });

  describe("file_exists", () => {
    it("resolves paths against the project directory", () => {
      const projectDir = makeTempDir();
      writeText(join(projectDir, "docs", "guide.md"), "# Guide\n");

      const outcome = evaluateAcceptance(
        { acceptance: { file_exists: ["docs/guide.md", "missing.md"] } },
        { projectDir },
      );

      expect(outcome.passed).toBe(false);
      expect(outcome.results).toEqual({
        "file_guide.md": { passed: true, details: "Found: docs/guide.md" },
        "file_missing.md": { passed: false, details: "Missing: missing.md" },
      });
    });

    it("suffixes colliding check names", () => {
      const projectDir = makeTempDir();
      writeText(join(projectDir, "a", "index.ts"), "");
      writeText(join(projectDir, "b", "index.ts"), "");

      const outcome = evaluateAcceptance(
        { acceptance: { file_exists: ["a/index.ts", "b/index.ts"] } },
        { projectDir },
      );

      expect(Object.keys(outcome.results)).toEqual(["file_index.ts", "file_index.ts_2"]);
      expect(outcome.results["file_index.ts_2"]?.details).toBe("Found: b/index.ts");
    });
  });

  describe("file_contains", () => {
    it("checks for a literal substring", () => {
      const projectDir = makeTempDir();
      writeText(join(projectDir, "App.swift"), "struct App { ImmersiveSpace(id: \"main\") }\n");

      const outcome = evaluateAcceptance(
        { acceptance: { file_contains: { "App.swift": "ImmersiveSpace" } } },
        { projectDir },
      );

      expect(outcome.results).toEqual({
        contains_ImmersiveSpace: { passed: true, details: "Pattern found in App.swift" },
      });
    });

    it("does not treat the pattern as a regular expression", () => {
      const projectDir = makeTempDir();
      writeText(join(projectDir, "notes.txt"), "value: abc\n");

      const outcome = evaluateAcceptance(
        { acceptance: { file_contains: { "notes.txt": "a.c" } } },
        { projectDir },
      );

      expect(outcome.results["contains_a.c"]).toEqual({
        passed: false,
        details: "Pattern not found in notes.txt",
      });
    });

    it("fails when the file is missing", () => {
      const projectDir = makeTempDir();
      const outcome = evaluateAcceptance(
        { acceptance: { file_contains: { "missing.txt": "hello" } } },
        { projectDir },
      );

      expect(outcome.results).toEqual({
        contains_hello: { passed: false, details: "File not found: missing.txt" },
      });
    });

    it("names the check after the first 20 characters of the pattern", () => {
      const projectDir = makeTempDir();
      writeText(join(projectDir, "alphabet.txt"), "abcdefghijklmnopqrstuvwxyz");

      const outcome = evaluateAcceptance(
        { acceptance: { file_contains: { "alphabet.txt": "abcdefghijklmnopqrstuvwxyz" } } },
        { projectDir },
      );

      expect(Object.keys(outcome.results)).toEqual(["contains_abcdefghijklmnopqrst"]);
    });
  });

  describe("command_succeeds", () => {
    it("passes on exit code 0 with trimmed stdout as details", () => {
      const projectDir = makeTempDir();
      const outcome = evaluateAcceptance(
        { acceptance: { command_succeeds: ["echo hello"] } },
        { projectDir },
      );

      expect(outcome).toEqual({
        passed: true,
        results: { cmd_echo: { passed: true, details: "hello" } },
      });
    });

    it("runs commands in the project directory", () => {
      const projectDir = makeTempDir();
      writeText(join(projectDir, "marker.txt"), "");

      const outcome = evaluateAcceptance(
        { acceptance: { command_succeeds: ["test -f marker.txt"] } },
        { projectDir },
      );

      expect(outcome.results.cmd_test).toEqual({ passed: true, details: "" });
    });

    it("fails on a non-zero exit with stderr as details", () => {
      const outcome = evaluateAcceptance(
        { acceptance: { command_succeeds: ["echo oops 1>&2; exit 3"] } },
        { projectDir: makeTempDir() },
      );

      expect(outcome.results.cmd_echo).toEqual({ passed: false, details: "oops" });
    });

    it("reports the exit code when stderr is empty", () => {
      const outcome = evaluateAcceptance(
        { acceptance: { command_succeeds: ["exit 4"] } },
        { projectDir: makeTempDir() },
      );

      expect(outcome.results.cmd_exit).toEqual({ passed: false, details: "Exited with code 4" });
    });

    it("truncates details to 100 characters", () => {
      const outcome = evaluateAcceptance(
        { acceptance: { command_succeeds: ["printf '%0150d' 0"] } },
        { projectDir: makeTempDir() },
      );

      expect(outcome.results.cmd_printf).toEqual({ passed: true, details: "0".repeat(100) });
    });

    it("fails a command that exceeds the timeout", () => {
      const started = Date.now();
      const outcome = evaluateAcceptance(
        { acceptance: { command_succeeds: ["exec sleep 5"] } },
        { projectDir: makeTempDir(), commandTimeoutMs: 200 },
      );

      expect(outcome.results.cmd_exec).toEqual({ passed: false, details: "Timed out after 200ms" });
      expect(Date.now() - started).toBeLessThan(4_000);
    });

    it("keeps evaluating after a failing check", () => {
      const outcome = evaluateAcceptance(
        { acceptance: { file_exists: ["nope.txt"], command_succeeds: ["echo still-ran"] } },
        { projectDir: makeTempDir() },
      );

      expect(outcome.passed).toBe(false);
      expect(outcome.results).toEqual({
        "file_nope.txt": { passed: false, details: "Missing: nope.txt" },
        cmd_echo: { passed: true, details: "still-ran" },
      });
    });
  });

  describe("test_passes", () => {
    it("delegates to the test runner and truncates output to 200 characters", () => {
      const runner = fakeRunner(true, "y".repeat(300));
      const outcome = evaluateAcceptance(
        { acceptance: { test_passes: "LoginTests" } },
        { testRunner: runner },
      );

      expect(runner.selectors).toEqual(["LoginTests"]);
      expect(outcome.passed).toBe(true);
      expect(outcome.results.tests).toEqual({ passed: true, details: "y".repeat(200) });
    });

    it("fails when the runner fails", () => {
      const outcome = evaluateAcceptance(
        { acceptance: { test_passes: "" } },
        { testRunner: fakeRunner(false, "1 failing") },
      );

      expect(outcome).toEqual({
        passed: false,
        results: { tests: { passed: false, details: "1 failing" } },
      });
    });

    it("fails when no runner is configured", () => {
      const outcome = evaluateAcceptance({ acceptance: { test_passes: "AnyTests" } });

      expect(outcome.results.tests).toEqual({
        passed: false,
        details: "No test runner configured (set testRunner in .manifesto.json)",
      });
    });
  });
});

describe("allPassed", () => {
  it("is the AND of every check", () => {
    expect(allPassed({})).toBe(true);
    expect(allPassed({ a: { passed: true, details: "" } })).toBe(true);
    expect(
      allPassed({ a: { passed: true, details: "" }, b: { passed: false, details: "" } }),
    ).toBe(false);
  });
});

describe("verifyTask", () => {
  const readmeTask = { id: "TASK-001", acceptance: { file_exists: ["README.md"] } };

  it("records a proof when every check passes", () => {
    const projectDir = makeTempDir();
    const manifestDir = join(projectDir, "docs", "_MANIFESTO");
    writeText(join(projectDir, "README.md"), "# Demo\n");
    const now = vi.fn(() => new Date("2026-05-01T10:00:00.000Z"));

    const outcome = verifyTask([readmeTask], "TASK-001", { manifestDir, projectDir, now });

    const proofFile = join(manifestDir, "tasks", "TASK-001_proof.json");
    expect(outcome).toEqual({
      taskId: "TASK-001",
      passed: true,
      results: { "file_README.md": { passed: true, details: "Found: README.md" } },
      proofPath: proofFile,
    });

    const proof: unknown = JSON.parse(readFileSync(proofFile, "utf-8"));
    expect(proof).toMatchObject({
      task_id: "TASK-001",
      timestamp: "2026-05-01T10:00:00.000Z",
      results: { "file_README.md": { passed: true, details: "Found: README.md" } },
    });
    expect(now).toHaveBeenCalledTimes(1);
  });

  it("writes no proof when a check fails", () => {
    const projectDir = makeTempDir();
    const manifestDir = join(projectDir, "docs", "_MANIFESTO");

    const outcome = verifyTask([readmeTask], "TASK-001", { manifestDir, projectDir });

    expect(outcome).toEqual({
      taskId: "TASK-001",
      passed: false,
      results: { "file_README.md": { passed: false, details: "Missing: README.md" } },
    });
    expect(existsSync(join(manifestDir, "tasks", "TASK-001_proof.json"))).toBe(false);
  });

  it("records a proof for a task with no criteria", () => {
    const projectDir = makeTempDir();
    const manifestDir = join(projectDir, "m");

    const outcome = verifyTask([{ id: "TASK-002", acceptance: {} }], "TASK-002", {
      manifestDir,
      projectDir,
    });

    expect(outcome.passed).toBe(true);
    expect(outcome.proofPath).toBe(join(manifestDir, "tasks", "TASK-002_proof.json"));
  });

  it("refuses a task that does not fit the task shape", () => {
    const projectDir = makeTempDir();
    const manifestDir = join(projectDir, "m");
    const broken = {
      id: "TASK-003",
      acceptance: {},
      decodeIssue: { field: "acceptance", message: "Unrecognized key(s) in object: 'file_exist'" },
    };

    const outcome = verifyTask([broken], "TASK-003", { manifestDir, projectDir });

    expect(outcome).toEqual({
      taskId: "TASK-003",
      passed: false,
      results: {
        error: {
          passed: false,
          details: "Task TASK-003 is invalid: acceptance: Unrecognized key(s) in object: 'file_exist'",
        },
      },
    });
    expect(existsSync(join(manifestDir, "tasks", "TASK-003_proof.json"))).toBe(false);
  });

  it("reports an unknown task as a single failed check", () => {
    const outcome = verifyTask([readmeTask], "TASK-999", { manifestDir: makeTempDir() });

    expect(outcome).toEqual({
      taskId: "TASK-999",
      passed: false,
      results: { error: { passed: false, details: "Task TASK-999 not found" } },
    });
  });
});
