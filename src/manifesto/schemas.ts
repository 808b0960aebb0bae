import { z } from "zod";

export const TASK_ID_PATTERN = /^TASK-\d{3}$/;

export const manifestoStatusEnum = z.enum(["Draft", "Approved", "In-dev", "Frozen"]);

/** Declarative success conditions. Unknown clause names are rejected so typos never pass vacuously. */
export const acceptanceCriteriaSchema = z
  .object({
    file_exists: z.array(z.string().min(1)).optional(),
    file_contains: z.record(z.string(), z.string()).optional(),
    command_succeeds: z.array(z.string().min(1)).optional(),
    performance_metric: z.record(z.string(), z.number()).optional(),
    test_passes: z.string().optional(),
  })
  .strict();

/**
 * Shape a task must have to be loaded at all. Deliberately loose on content:
 * the validator owns the id pattern and non-empty text rules.
 */
export const storedTaskSchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  description: z.string().default(""),
  owner_role: z.string().default(""),
  depends_on: z.array(z.string()).default([]),
  vision_link: z.string().optional(),
  acceptance: acceptanceCriteriaSchema.default({}),
});

/** Structural rules for a task that passed loading. */
export const taskSchema = storedTaskSchema.extend({
  id: z.string().regex(TASK_ID_PATTERN, "must match TASK-###"),
  description: z.string().trim().min(1, "is required"),
  owner_role: z.string().trim().min(1, "is required"),
});

export const guardrailSchema = z.object({
  name: z.string().min(1),
  target: z.string().min(1),
  measurement: z.string().optional(),
});

export const metricsSchema = z.object({
  north_star: z.string().min(1),
  guardrails: z.array(guardrailSchema),
});

/**
 * Top-level manifesto.yaml. Extra keys (vision, agents, checklists...) are
 * tolerated and stripped. Embedded tasks are checked through the task store,
 * not here, since per-task files may replace them.
 */
export const manifestoSchema = z.object({
  prd_id: z.string().min(1),
  title: z.string().min(1),
  status: manifestoStatusEnum,
  owner: z.string().min(1),
  tech_stack: z.array(z.string()),
  metrics: metricsSchema,
});

export const planTaskSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  depends_on: z.array(z.string()).default([]),
  owner_role: z.string(),
  acceptance: acceptanceCriteriaSchema.default({}),
});

/** Persisted plan.json. */
export const planSchema = z.object({
  prd_id: z.string(),
  title: z.string(),
  tasks: z.array(planTaskSchema),
});

export const checkResultSchema = z.object({
  passed: z.boolean(),
  details: z.string(),
});

/** Persisted TASK-###_proof.json. */
export const proofSchema = z.object({
  task_id: z.string(),
  timestamp: z.string(),
  results: z.record(z.string(), checkResultSchema),
  file_hashes: z.record(z.string(), z.string()),
});

/** Render a zod issue path as `tasks[2].acceptance.file_exists`. */
export function issuePath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, "");
}

/** Field path and message of one schema violation. */
export interface FieldIssue {
  field: string;
  message: string;
}

export function firstIssue(error: z.ZodError): FieldIssue {
  const issue = error.issues[0];
  if (!issue) return { field: "", message: "invalid value" };
  return { field: issuePath(issue.path), message: issue.message };
}

/** `path: message`, or just the message for a root-level issue. */
export function formatIssue(issue: FieldIssue): string {
  return issue.field ? `${issue.field}: ${issue.message}` : issue.message;
}

/** First issue of a failed parse as `path: message`. */
export function describeIssue(error: z.ZodError): string {
  return formatIssue(firstIssue(error));
}
