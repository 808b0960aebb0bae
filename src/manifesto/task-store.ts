import { existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import { DuplicateTaskIdError, ParseError, errorMessage } from "../errors.js";
import type { Logger, Task } from "../types.js";
import { consoleLogger } from "../utils/logger.js";
import { EMBEDDED_SOURCE, manifestoPath, tasksDir } from "./paths.js";
import { isRecord, loadManifesto, readYamlFile } from "./reader.js";
import { firstIssue, storedTaskSchema, type FieldIssue } from "./schemas.js";

/** Per-task files: TASK-001.yaml, TASK-001-auth.yml, ... Proof JSON files never match. */
const TASK_FILE_RE = /^TASK-.*\.ya?ml$/;

export interface LoadTasksOptions {
  logger?: Logger;
}

function stringField(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/** Keeps an undecodable task addressable by id so validation can reject it. */
function undecodedTask(data: Record<string, unknown>, sourceFile: string, issue: FieldIssue): Task {
  const deps = Array.isArray(data.depends_on) ? data.depends_on : [];
  return {
    id: String(data.id),
    description: stringField(data.description),
    owner_role: stringField(data.owner_role),
    depends_on: deps.filter((d): d is string => typeof d === "string"),
    acceptance: {},
    source_file: sourceFile,
    decodeIssue: issue,
  };
}

/**
 * Decode one task document. Returns null (after a warning) when the value
 * is not a mapping or has no id. A task that has an id but does not fit the
 * task shape is kept with its `decodeIssue` set.
 */
function decodeTask(
  data: unknown,
  sourceFile: string,
  label: string,
  logger: Logger,
): Task | null {
  if (!isRecord(data)) {
    logger.warn(`Task ${label} is not a YAML mapping, skipping`);
    return null;
  }
  if (data.id === undefined || data.id === null || data.id === "") {
    logger.warn(`Task ${label} missing 'id' field, skipping`);
    return null;
  }

  const parsed = storedTaskSchema.safeParse(data);
  if (!parsed.success) {
    return undecodedTask(data, sourceFile, firstIssue(parsed.error));
  }
  return { ...parsed.data, source_file: sourceFile };
}

/** Load a single task file. Unreadable or invalid files yield null, never throw. */
export function loadTaskFile(filePath: string, logger: Logger = consoleLogger): Task | null {
  let data: unknown;
  try {
    data = readYamlFile(filePath);
  } catch (err) {
    logger.warn(`Failed to load ${filePath}: ${errorMessage(err)}`);
    return null;
  }
  return decodeTask(data, filePath, filePath, logger);
}

function listTaskFiles(dir: string): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) return [];
  return readdirSync(dir)
    .filter((entry) => TASK_FILE_RE.test(entry))
    .sort()
    .map((entry) => join(dir, entry));
}

function loadEmbeddedTasks(manifestDir: string, logger: Logger): Task[] {
  const file = manifestoPath(manifestDir);
  if (!existsSync(file)) return [];

  const data = loadManifesto(file);
  const raw = data.tasks ?? [];
  if (!Array.isArray(raw)) {
    throw new ParseError(file, "'tasks' must be a list");
  }

  const tasks: Task[] = [];
  raw.forEach((entry, i) => {
    const task = decodeTask(entry, EMBEDDED_SOURCE, `${EMBEDDED_SOURCE} tasks[${i}]`, logger);
    if (task) tasks.push(task);
  });
  return tasks;
}

/** Throws on the first id seen twice, naming both sources. */
export function checkDuplicateIds(tasks: ReadonlyArray<Pick<Task, "id" | "source_file">>): void {
  const seen = new Map<string, string>();
  for (const task of tasks) {
    const first = seen.get(task.id);
    if (first !== undefined) {
      throw new DuplicateTaskIdError(task.id, first, task.source_file);
    }
    seen.set(task.id, task.source_file);
  }
}

/**
 * Load every task for a manifest directory.
 *
 * Per-task files under `tasks/` win. When that directory is missing, empty,
 * or yields no task with an id, the embedded `tasks` list of manifesto.yaml
 * is used instead. Ids must be unique across the result.
 */
export function loadTasks(manifestDir: string, options: LoadTasksOptions = {}): Task[] {
  const logger = options.logger ?? consoleLogger;
  const dir = tasksDir(manifestDir);

  let tasks: Task[] = [];
  const files = listTaskFiles(dir);
  for (const file of files) {
    const task = loadTaskFile(file, logger);
    if (task) tasks.push(task);
  }

  if (tasks.length === 0) {
    tasks = loadEmbeddedTasks(manifestDir, logger);
  }

  checkDuplicateIds(tasks);
  return tasks;
}

/** Find a task by id. */
export function findTask<T extends { id: string }>(tasks: readonly T[], taskId: string): T | undefined {
  return tasks.find((t) => t.id === taskId);
}
