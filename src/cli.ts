#!/usr/bin/env node

import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { createInterface } from "node:readline";
import { fileURLToPath } from "node:url";
import { loadConfig, resolveManifestDir } from "./config/loader.js";
import { errorMessage } from "./errors.js";
import { isRecord, loadManifesto } from "./manifesto/reader.js";
import { loadTasks } from "./manifesto/task-store.js";
import { checkDependencies } from "./plan/dependencies.js";
import { executePlan, readPlan, validatePlan, type TaskExecutor } from "./plan/planner.js";
import {
  formatPlanReport,
  formatPlatformReport,
  formatStatusReport,
  formatValidationReport,
  formatVerificationReport,
} from "./reporter/human.js";
import { formatJsonReport } from "./reporter/json.js";
import { injectManifesto } from "./setup/inject.js";
import type { PlanTask, Proof } from "./types.js";
import { buildPlan } from "./tools/build-plan.js";
import { checkWorkspace } from "./tools/validate-manifesto.js";
import { verifyWorkspaceTask } from "./tools/verify-task.js";
import { openWorkspace, type Workspace } from "./tools/workspace.js";
import { PROMPT_TYPES, generatePrompt, type PromptType } from "./prompts/generator.js";
import { allPassed } from "./verify/evaluator.js";
import { checkVisionOsSetup } from "./verify/platform.js";
import { readProof } from "./verify/proof.js";

const __filename_cli = fileURLToPath(import.meta.url);
const __dirname_cli = dirname(__filename_cli);
const cliPkg: unknown = JSON.parse(
  readFileSync(join(__dirname_cli, "..", "package.json"), "utf-8"),
);
const cliPkgVersion = isRecord(cliPkg) && typeof cliPkg.version === "string" ? cliPkg.version : "0.0.0";

const program = new Command();

program
  .name("manifesto")
  .description("Manifesto engine — project contracts, atomic tasks, verified acceptance")
  .version(cliPkgVersion);

const MANIFEST_FLAGS = "--manifest <file>";
const MANIFEST_HELP = "manifesto.yaml to use instead of the configured manifestDir";

/** Workspace for the current directory, honouring --manifest. */
function workspace(opts: { manifest?: string }): Workspace {
  return openWorkspace(process.cwd(), { manifestPath: opts.manifest });
}

function fail(command: string, err: unknown): never {
  console.error(`Error: manifesto ${command} failed — ${errorMessage(err)}`);
  process.exit(1);
}

// ── init ────────────────────────────────────────────────────────────

program
  .command("init")
  .description("Inject a manifesto into a project")
  .requiredOption("--name <name>", "Project name")
  .option("--type <type>", "Project type (visionos, swift, node, python, ...)", "visionos")
  .option("--path <dir>", "Project path", ".")
  .option("--force", "Overwrite an existing manifesto.yaml")
  .action((opts: { name: string; type: string; path: string; force?: boolean }) => {
    try {
      const projectDir = resolve(opts.path);
      const config = loadConfig(projectDir);
      const manifestDir = resolveManifestDir(projectDir, config);

      console.log(`Initializing ${opts.type} project: ${opts.name}`);
      const result = injectManifesto(
        projectDir,
        {
          projectName: opts.name,
          projectType: opts.type,
          date: new Date(),
          engineVersion: cliPkgVersion,
        },
        { manifestDir, force: opts.force },
      );

      for (const file of result.created) {
        console.log(`  + ${file}`);
      }
      console.log(`Manifesto initialized at ${result.manifestDir}`);
    } catch (err) {
      fail("init", err);
    }
  });

// ── status ──────────────────────────────────────────────────────────

program
  .command("status")
  .description("Show manifesto status and verified tasks")
  .option(MANIFEST_FLAGS, MANIFEST_HELP)
  .action((opts: { manifest?: string }) => {
    try {
      const ws = workspace(opts);
      const doc = loadManifesto(ws.manifestPath);
      const tasks = loadTasks(ws.manifestDir);

      const proofs = new Map<string, Proof>();
      for (const task of tasks) {
        const proof = readProof(ws.manifestDir, task.id);
        if (proof) proofs.set(task.id, proof);
      }

      console.log(
        formatStatusReport({
          title: typeof doc.title === "string" ? doc.title : "(untitled)",
          status: typeof doc.status === "string" ? doc.status : "(unknown)",
          taskIds: tasks.map((t) => t.id),
          proofs,
        }),
      );
    } catch (err) {
      fail("status", err);
    }
  });

// ── validate ────────────────────────────────────────────────────────

program
  .command("validate")
  .description("Check the manifesto and tasks against schema and policy limits")
  .option("--json", "Output structured JSON")
  .option(MANIFEST_FLAGS, MANIFEST_HELP)
  .action((opts: { json?: boolean; manifest?: string }) => {
    try {
      const check = checkWorkspace(workspace(opts));
      if (opts.json) {
        console.log(formatJsonReport({ ...check.result, dependencyIssues: check.dependencyIssues }));
      } else {
        console.log(formatValidationReport(check.result, check.tasks.length, check.dependencyIssues));
      }
      process.exit(check.result.valid ? 0 : 1);
    } catch (err) {
      fail("validate", err);
    }
  });

// ── verify ──────────────────────────────────────────────────────────

program
  .command("verify")
  .description("Verify a task's acceptance criteria and record a proof")
  .argument("<taskId>", "Task id, e.g. TASK-001")
  .option("--json", "Output structured JSON")
  .option(MANIFEST_FLAGS, MANIFEST_HELP)
  .action((taskId: string, opts: { json?: boolean; manifest?: string }) => {
    try {
      const ws = workspace(opts);
      if (!opts.json) console.log(`Verifying task ${taskId}...`);
      const outcome = verifyWorkspaceTask(ws, taskId);

      console.log(opts.json ? formatJsonReport(outcome) : formatVerificationReport(outcome));
      process.exit(outcome.passed ? 0 : 1);
    } catch (err) {
      fail("verify", err);
    }
  });

// ── plan ────────────────────────────────────────────────────────────

program
  .command("plan")
  .description("Snapshot tasks into plan.json for review before execution")
  .option("--json", "Output structured JSON")
  .option(MANIFEST_FLAGS, MANIFEST_HELP)
  .action((opts: { json?: boolean; manifest?: string }) => {
    try {
      const build = buildPlan(workspace(opts));
      if (opts.json) {
        console.log(formatJsonReport(build));
      } else {
        console.log(formatPlanReport(build.plan, build.validation, build.dependencyIssues, build.planFile));
      }
      process.exit(build.validation.valid ? 0 : 1);
    } catch (err) {
      fail("plan", err);
    }
  });

// ── execute ─────────────────────────────────────────────────────────

function verifyingExecutor(ws: Workspace, tasks: readonly PlanTask[]): TaskExecutor {
  return (task) => {
    const outcome = verifyWorkspaceTask(ws, task.id, { tasks });
    console.log(formatVerificationReport(outcome));
    return outcome.passed;
  };
}

program
  .command("execute")
  .description("Execute the reviewed plan.json, stopping at the first failure")
  .option("--approve", "Confirm the reviewed plan without prompting")
  .option("--verify", "Use acceptance verification as each task's success signal")
  .option(MANIFEST_FLAGS, MANIFEST_HELP)
  .action(async (opts: { approve?: boolean; verify?: boolean; manifest?: string }) => {
    try {
      const ws = workspace(opts);
      const plan = readPlan(ws.manifestDir);
      const validation = validatePlan(plan, ws.config.limits);

      console.log(formatPlanReport(plan, validation, checkDependencies(plan.tasks)));
      if (!validation.valid) {
        process.exit(1);
      }

      const approved =
        opts.approve === true ||
        (process.stdin.isTTY === true && (await askYesNo("\nExecute this plan? (y/N): ")));
      if (!approved) {
        console.error("Execution not approved. Review plan.json, then re-run with --approve.");
        process.exit(1);
      }

      const runTask = opts.verify ? verifyingExecutor(ws, plan.tasks) : undefined;
      const result = await executePlan(plan, runTask);
      process.exit(result.passed ? 0 : 1);
    } catch (err) {
      fail("execute", err);
    }
  });

// ── prompt ──────────────────────────────────────────────────────────

program
  .command("prompt")
  .description("Render the worker or supervisor prompt for a task")
  .argument("<taskId>", "Task id, e.g. TASK-001")
  .addOption(new Option("--type <type>", "Prompt type").choices(PROMPT_TYPES).default("worker"))
  .option("--summary <text>", "Worker summary to include in a supervisor prompt")
  .option(MANIFEST_FLAGS, MANIFEST_HELP)
  .action((taskId: string, opts: { type: PromptType; summary?: string; manifest?: string }) => {
    try {
      const ws = workspace(opts);
      const prompt = generatePrompt(ws.manifestDir, taskId, opts.type, {
        workerSummary: opts.summary,
      });
      if (prompt === null) {
        throw new Error(`Task ${taskId} not found`);
      }
      console.log(prompt);
    } catch (err) {
      fail("prompt", err);
    }
  });

// ── doctor ──────────────────────────────────────────────────────────

program
  .command("doctor")
  .description("Check visionOS setup: RealityKit import and Package.swift platform")
  .action(() => {
    try {
      const results = checkVisionOsSetup(process.cwd());
      console.log(formatPlatformReport(results));
      process.exit(allPassed(results) ? 0 : 1);
    } catch (err) {
      fail("doctor", err);
    }
  });

function askYesNo(question: string): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    rl.question(question, (answer) => {
      rl.close();
      const trimmed = answer.trim().toLowerCase();
      resolve(trimmed === "y" || trimmed === "yes");
    });
  });
}

program.parseAsync().catch((err: unknown) => fail("cli", err));
