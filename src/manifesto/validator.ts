import type {
  PolicyLimits,
  Task,
  ValidationError,
  ValidationResult,
} from "../types.js";
import {
  describeIssue,
  firstIssue,
  formatIssue,
  issuePath,
  manifestoSchema,
  taskSchema,
  type FieldIssue,
} from "./schemas.js";

/** Radical-clarity defaults: few tasks, each describable in one short sentence. */
export const DEFAULT_LIMITS: PolicyLimits = {
  maxTasks: 8,
  maxDescriptionWords: 12,
  maxDescriptionLength: 120,
};

/** Whitespace-delimited word count. */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
}

/** Task-count rule. Shared with plan validation. */
export function checkTaskCount(count: number, limits: PolicyLimits): ValidationError | null {
  if (count <= limits.maxTasks) return null;
  return {
    type: "task_limit",
    message: `Too many tasks: ${count} (max ${limits.maxTasks})`,
    context: { field: "tasks", actual: count, limit: limits.maxTasks },
  };
}

/** Description word-count rule. Shared with plan validation. */
export function checkDescriptionWords(
  taskId: string,
  description: string,
  limits: PolicyLimits,
): ValidationError | null {
  const words = countWords(description);
  if (words <= limits.maxDescriptionWords) return null;
  return {
    type: "description_words",
    message: `Task ${taskId} description has ${words} words (max ${limits.maxDescriptionWords})`,
    context: { taskId, field: "description", actual: words, limit: limits.maxDescriptionWords },
  };
}

function checkDescriptionLength(task: Task, limits: PolicyLimits): ValidationError | null {
  const length = task.description.length;
  if (length <= limits.maxDescriptionLength) return null;
  return {
    type: "description_length",
    message: `Task ${task.id} description has ${length} characters (max ${limits.maxDescriptionLength})`,
    context: {
      taskId: task.id,
      field: "description",
      actual: length,
      limit: limits.maxDescriptionLength,
    },
  };
}

function checkTaskShape(task: Task): FieldIssue | null {
  const parsed = taskSchema.safeParse(task);
  return parsed.success ? null : firstIssue(parsed.error);
}

/** Policy layer, evaluated only once structure is known to be sound. */
export function checkPolicy(tasks: readonly Task[], limits: PolicyLimits): ValidationError | null {
  const countError = checkTaskCount(tasks.length, limits);
  if (countError) return countError;

  for (const task of tasks) {
    const error =
      checkDescriptionLength(task, limits) ??
      checkDescriptionWords(task.id, task.description, limits);
    if (error) return error;
  }
  return null;
}

/**
 * Validate a manifesto document and the tasks loaded for it.
 *
 * Structural rules run first (document, then each task), policy limits
 * second. Stops at the first violation.
 */
export function validateManifesto(
  document: unknown,
  tasks: readonly Task[],
  limits: PolicyLimits = DEFAULT_LIMITS,
): ValidationResult {
  const doc = manifestoSchema.safeParse(document);
  if (!doc.success) {
    const issue = doc.error.issues[0];
    return {
      valid: false,
      error: {
        type: "schema_error",
        message: `Invalid manifesto: ${describeIssue(doc.error)}`,
        context: { field: issue ? issuePath(issue.path) : "" },
      },
    };
  }

  for (const task of tasks) {
    const issue = task.decodeIssue ?? checkTaskShape(task);
    if (issue) {
      return {
        valid: false,
        error: {
          type: "task_schema_error",
          message: `Invalid task ${task.id} (${task.source_file}): ${formatIssue(issue)}`,
          context: { taskId: task.id, source: task.source_file, field: issue.field },
        },
      };
    }
  }

  const policyError = checkPolicy(tasks, limits);
  if (policyError) return { valid: false, error: policyError };

  return { valid: true, manifesto: doc.data };
}
