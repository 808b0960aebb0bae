import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { InvalidTaskError, ParseError, PlanNotFoundError, errorMessage } from "../errors.js";
import { planPath } from "../manifesto/paths.js";
import { isNotFound, loadManifesto } from "../manifesto/reader.js";
import { describeIssue, formatIssue, planSchema } from "../manifesto/schemas.js";
import { loadTasks } from "../manifesto/task-store.js";
import {
  DEFAULT_LIMITS,
  checkDescriptionWords,
  checkTaskCount,
} from "../manifesto/validator.js";
import type { Logger, Plan, PlanTask, PolicyLimits, Task } from "../types.js";
import { consoleLogger } from "../utils/logger.js";
import { atomicWriteJson } from "../verify/proof.js";

export type PlanValidation = { valid: true } | { valid: false; reason: string };

/** Runs one plan task. Resolves true on success. */
export type TaskExecutor = (task: PlanTask) => boolean | Promise<boolean>;

export interface ExecutionResult {
  passed: boolean;
  /** Ids that ran, in order, including the failing one. */
  executed: string[];
  failedTask?: string;
  reason?: string;
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  return value === undefined || value === null ? "" : String(value);
}

/** Authoring-only fields (title, vision_link, source_file) are dropped. */
export function toPlanTask(task: Task): PlanTask {
  return {
    id: task.id,
    description: task.description,
    depends_on: [...task.depends_on],
    owner_role: task.owner_role,
    acceptance: task.acceptance,
  };
}

/**
 * Build a plan from manifesto.yaml and the tasks stored beside it.
 * Pure with respect to the plan file: nothing is written. Throws
 * InvalidTaskError for a task that does not fit the task shape.
 */
export function generatePlan(manifestPath: string, options: { logger?: Logger } = {}): Plan {
  const path = resolve(manifestPath);
  const data = loadManifesto(path);
  const tasks = loadTasks(dirname(path), { logger: options.logger });

  const broken = tasks.find((t) => t.decodeIssue);
  if (broken?.decodeIssue) {
    throw new InvalidTaskError(broken.id, broken.source_file, formatIssue(broken.decodeIssue));
  }

  return {
    prd_id: asText(data.prd_id),
    title: asText(data.title),
    tasks: tasks.map(toPlanTask),
  };
}

/**
 * Re-check the task-count and word-count limits against the plan itself.
 * Plans can be hand-edited after generation, so earlier validation is not trusted.
 */
export function validatePlan(plan: Plan, limits: PolicyLimits = DEFAULT_LIMITS): PlanValidation {
  const countError = checkTaskCount(plan.tasks.length, limits);
  if (countError) {
    return { valid: false, reason: `Plan invalid: ${countError.message}` };
  }

  for (const task of plan.tasks) {
    const wordsError = checkDescriptionWords(task.id, task.description, limits);
    if (wordsError) {
      return { valid: false, reason: `Plan invalid: ${wordsError.message}` };
    }
  }

  return { valid: true };
}

/** Persist the plan to `<manifestDir>/plan.json`. Returns the path written. */
export function writePlan(manifestDir: string, plan: Plan): string {
  const path = planPath(manifestDir);
  atomicWriteJson(path, plan);
  return path;
}

/** Read and decode the persisted plan. */
export function readPlan(manifestDir: string): Plan {
  const path = planPath(manifestDir);
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) throw new PlanNotFoundError(path);
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ParseError(path, errorMessage(err));
  }

  const parsed = planSchema.safeParse(data);
  if (!parsed.success) {
    throw new ParseError(path, describeIssue(parsed.error));
  }
  return parsed.data;
}

/** Placeholder executor: logs the task and reports success. */
export function stubExecutor(logger: Logger = consoleLogger): TaskExecutor {
  return (task) => {
    logger.info(`→ ${task.id}: ${task.description} … [SKIPPED – stub executor]`);
    return true;
  };
}

/**
 * Run plan tasks sequentially in plan order, stopping at the first failure.
 * A task that throws counts as failed.
 */
export async function executePlan(
  plan: Plan,
  runTask?: TaskExecutor,
  options: { logger?: Logger } = {},
): Promise<ExecutionResult> {
  const logger = options.logger ?? consoleLogger;
  const run = runTask ?? stubExecutor(logger);
  const executed: string[] = [];

  logger.info("⚡ EXECUTION BEGIN – STOPS ON FIRST FAILURE ⚡");
  for (const task of plan.tasks) {
    executed.push(task.id);

    let ok: boolean;
    let reason: string | undefined;
    try {
      ok = await run(task);
    } catch (err) {
      ok = false;
      reason = errorMessage(err);
    }

    if (!ok) {
      const message = reason ?? `Task ${task.id} reported failure`;
      logger.info(`✗ ${task.id} failed — stopping: ${message}`);
      return { passed: false, executed, failedTask: task.id, reason: message };
    }
  }

  logger.info(`✅ All ${plan.tasks.length} task(s) reported success.`);
  return { passed: true, executed };
}
