import type { ManifestoConfig, TestRunner, TestRunResult } from "../types.js";
import { execFile, execShell, type ExecOptions, type ExecResult } from "./exec.js";

function toRunResult(result: ExecResult): TestRunResult {
  const combined = result.stdout + result.stderr;
  if (result.error) {
    return { passed: false, output: combined ? `${result.error}\n${combined}` : result.error };
  }
  return { passed: result.exitCode === 0, output: combined };
}

/** Selectors that mean "run everything". */
function isRunAll(selector: string): boolean {
  const trimmed = selector.trim();
  return trimmed === "" || trimmed === "*" || trimmed === "all";
}

/** `swift test [--filter <selector>]` */
export function swiftTestRunner(options: ExecOptions): TestRunner {
  return {
    name: "swift",
    runTests(selector) {
      const args = isRunAll(selector) ? ["test"] : ["test", "--filter", selector.trim()];
      return toRunResult(execFile("swift", args, options));
    },
  };
}

/** `npm test [-- <selector>]` */
export function nodeTestRunner(options: ExecOptions): TestRunner {
  return {
    name: "node",
    runTests(selector) {
      const args = isRunAll(selector) ? ["test"] : ["test", "--", selector.trim()];
      return toRunResult(execFile("npm", args, options));
    },
  };
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Any shell command; `{selector}` is replaced by the quoted selector. */
export function shellTestRunner(commandTemplate: string, options: ExecOptions): TestRunner {
  return {
    name: "shell",
    runTests(selector) {
      const command = commandTemplate.replaceAll("{selector}", shellQuote(selector.trim()));
      return toRunResult(execShell(command, options));
    },
  };
}

/** Fails every request: a declared test clause with no runner cannot be satisfied. */
export const noTestRunner: TestRunner = {
  name: "none",
  runTests() {
    return { passed: false, output: "No test runner configured (set testRunner in .manifesto.json)" };
  },
};

/** Select the runner named in configuration. */
export function createTestRunner(config: ManifestoConfig, projectDir: string): TestRunner {
  const options: ExecOptions = { cwd: projectDir, timeoutMs: config.testTimeoutMs };
  switch (config.testRunner) {
    case "swift":
      return swiftTestRunner(options);
    case "node":
      return nodeTestRunner(options);
    case "shell":
      if (!config.testCommand) {
        throw new Error(`testRunner "shell" requires testCommand in .manifesto.json`);
      }
      return shellTestRunner(config.testCommand, options);
    case "none":
      return noTestRunner;
  }
}
