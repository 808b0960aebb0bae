import { existsSync, readFileSync } from "node:fs";
import { basename, resolve } from "node:path";
import { errorMessage } from "../errors.js";
import { formatIssue } from "../manifesto/schemas.js";
import { findTask } from "../manifesto/task-store.js";
import type {
  AcceptanceCriteria,
  CheckResult,
  Task,
  TestRunner,
  VerificationOutcome,
  VerificationResult,
} from "../types.js";
import { execShell } from "./exec.js";
import { recordProof } from "./proof.js";
import { noTestRunner } from "./runners.js";

export const COMMAND_TIMEOUT_MS = 30_000;

const COMMAND_DETAIL_LIMIT = 100;
const TEST_DETAIL_LIMIT = 200;
const PATTERN_KEY_LIMIT = 20;

export interface EvaluateOptions {
  /** Base for relative paths and working directory for commands. Defaults to cwd. */
  projectDir?: string;
  testRunner?: TestRunner;
  commandTimeoutMs?: number;
}

export interface VerifyTaskOptions extends EvaluateOptions {
  /** Where proofs are written. */
  manifestDir: string;
  now?: () => Date;
}

/** Record under `name`, suffixing `_2`, `_3`... when the name is taken. */
function addResult(results: VerificationResult, name: string, result: CheckResult): void {
  let key = name;
  for (let n = 2; Object.hasOwn(results, key); n++) {
    key = `${name}_${n}`;
  }
  results[key] = result;
}

function checkFilesExist(files: string[], projectDir: string, results: VerificationResult): void {
  for (const file of files) {
    const exists = existsSync(resolve(projectDir, file));
    addResult(results, `file_${basename(file)}`, {
      passed: exists,
      details: `${exists ? "Found" : "Missing"}: ${file}`,
    });
  }
}

function checkFilesContain(
  expectations: Record<string, string>,
  projectDir: string,
  results: VerificationResult,
): void {
  for (const [file, pattern] of Object.entries(expectations)) {
    const name = `contains_${pattern.slice(0, PATTERN_KEY_LIMIT)}`;
    const fullPath = resolve(projectDir, file);

    if (!existsSync(fullPath)) {
      addResult(results, name, { passed: false, details: `File not found: ${file}` });
      continue;
    }

    let content: string;
    try {
      content = readFileSync(fullPath, "utf-8");
    } catch (err) {
      addResult(results, name, { passed: false, details: `Could not read ${file}: ${errorMessage(err)}` });
      continue;
    }

    const found = content.includes(pattern);
    addResult(results, name, {
      passed: found,
      details: `Pattern ${found ? "found" : "not found"} in ${file}`,
    });
  }
}

function checkCommands(
  commands: string[],
  projectDir: string,
  timeoutMs: number,
  results: VerificationResult,
): void {
  for (const command of commands) {
    const name = `cmd_${command.trim().split(/\s+/)[0]}`;
    const run = execShell(command, { cwd: projectDir, timeoutMs });

    if (run.error) {
      addResult(results, name, { passed: false, details: run.error });
      continue;
    }

    const passed = run.exitCode === 0;
    const stream = passed ? run.stdout : run.stderr;
    let details = stream.slice(0, COMMAND_DETAIL_LIMIT).trim();
    if (!passed && details === "") {
      details = `Exited with code ${run.exitCode}`;
    }
    addResult(results, name, { passed, details });
  }
}

function checkTests(selector: string, runner: TestRunner, results: VerificationResult): void {
  const { passed, output } = runner.runTests(selector);
  addResult(results, "tests", { passed, details: output.slice(0, TEST_DETAIL_LIMIT) });
}

/** AND over every check. Vacuously true for an empty result. */
export function allPassed(results: VerificationResult): boolean {
  return Object.values(results).every((r) => r.passed);
}

/**
 * Evaluate one task's acceptance criteria against the live environment.
 *
 * Clauses run in a fixed order (files, contents, commands, tests). A
 * failing check never stops the others; performance_metric is a declared
 * target only and records nothing.
 */
export function evaluateAcceptance(
  task: { acceptance: AcceptanceCriteria },
  options: EvaluateOptions = {},
): { passed: boolean; results: VerificationResult } {
  const projectDir = options.projectDir ?? process.cwd();
  const acceptance = task.acceptance;
  const results: VerificationResult = {};

  if (acceptance.file_exists) {
    checkFilesExist(acceptance.file_exists, projectDir, results);
  }
  if (acceptance.file_contains) {
    checkFilesContain(acceptance.file_contains, projectDir, results);
  }
  if (acceptance.command_succeeds) {
    checkCommands(
      acceptance.command_succeeds,
      projectDir,
      options.commandTimeoutMs ?? COMMAND_TIMEOUT_MS,
      results,
    );
  }
  if (acceptance.test_passes !== undefined) {
    checkTests(acceptance.test_passes, options.testRunner ?? noTestRunner, results);
  }

  return { passed: allPassed(results), results };
}

function failedOutcome(taskId: string, details: string): VerificationOutcome {
  return { taskId, passed: false, results: { error: { passed: false, details } } };
}

/**
 * Verify a task by id and record a proof when every check passes.
 * An unknown id or an undecodable task is reported as a single failed check.
 */
export function verifyTask(
  tasks: ReadonlyArray<Pick<Task, "id" | "acceptance" | "decodeIssue">>,
  taskId: string,
  options: VerifyTaskOptions,
): VerificationOutcome {
  const task = findTask(tasks, taskId);
  if (!task) {
    return failedOutcome(taskId, `Task ${taskId} not found`);
  }
  if (task.decodeIssue) {
    return failedOutcome(taskId, `Task ${taskId} is invalid: ${formatIssue(task.decodeIssue)}`);
  }

  const { passed, results } = evaluateAcceptance(task, options);
  if (!passed) {
    return { taskId, passed, results };
  }

  const { path } = recordProof(options.manifestDir, task, results, {
    projectDir: options.projectDir,
    now: options.now,
  });
  return { taskId, passed, results, proofPath: path };
}
