import { existsSync } from "node:fs";
import { InvalidTaskError } from "../errors.js";
import { manifestoPath } from "../manifesto/paths.js";
import { isRecord, loadManifesto } from "../manifesto/reader.js";
import { formatIssue } from "../manifesto/schemas.js";
import { findTask, loadTasks } from "../manifesto/task-store.js";
import type { AcceptanceCriteria, Logger, Task } from "../types.js";

export type PromptType = "worker" | "supervisor";

export const PROMPT_TYPES: readonly PromptType[] = ["worker", "supervisor"];

export interface SupervisorPromptOptions {
  workerSummary?: string;
  workerName?: string;
  now?: () => Date;
}

export interface GeneratePromptOptions extends SupervisorPromptOptions {
  logger?: Logger;
}

/** Markdown list of every declared acceptance clause, one section per clause. */
export function formatAcceptanceCriteria(acceptance: AcceptanceCriteria): string {
  const sections: string[] = [];

  if (acceptance.file_exists) {
    sections.push(
      ["**Files that must exist:**", ...acceptance.file_exists.map((f) => `- ${f}`)].join("\n"),
    );
  }
  if (acceptance.file_contains) {
    const lines = Object.entries(acceptance.file_contains).map(([f, text]) => `- ${f}: '${text}'`);
    sections.push(["**Files must contain:**", ...lines].join("\n"));
  }
  if (acceptance.command_succeeds) {
    sections.push(
      ["**Commands that must succeed:**", ...acceptance.command_succeeds.map((c) => `- \`${c}\``)].join(
        "\n",
      ),
    );
  }
  if (acceptance.performance_metric) {
    const lines = Object.entries(acceptance.performance_metric).map(([m, v]) => `- ${m}: ${v}`);
    sections.push(["**Performance metrics:**", ...lines].join("\n"));
  }
  if (acceptance.test_passes !== undefined) {
    sections.push(`**Tests that must pass:** ${acceptance.test_passes}`);
  }

  return sections.length > 0 ? sections.join("\n\n") : "No specific acceptance criteria defined";
}

function taskTitle(task: Task): string {
  return task.title ?? task.description.slice(0, 50);
}

/** `vision` may be a sentence or a mapping of named statements. */
function formatVision(vision: unknown): string {
  if (typeof vision === "string" && vision.trim() !== "") return vision.trim();
  if (isRecord(vision)) {
    const lines = Object.entries(vision).map(([key, value]) => `- **${key}:** ${String(value)}`);
    if (lines.length > 0) return lines.join("\n");
  }
  return "No vision statement";
}

function northStar(manifesto: Record<string, unknown>): string {
  const metrics = manifesto.metrics;
  if (isRecord(metrics) && typeof metrics.north_star === "string") return metrics.north_star;
  return "No north star metric";
}

/** Brief for the agent that implements a task. */
export function buildWorkerPrompt(task: Task, manifesto: Record<string, unknown>): string {
  const deps =
    task.depends_on.length > 0
      ? `\n\n## Depends on\n${task.depends_on.map((d) => `- ${d}`).join("\n")}`
      : "";

  return `# Task: ${task.id} — ${taskTitle(task)}

## Vision
${formatVision(manifesto.vision)}

**North star:** ${northStar(manifesto)}

## What to build
${task.description}

**Vision link:** ${task.vision_link ?? "No vision link specified"}${deps}

## Acceptance criteria
${formatAcceptanceCriteria(task.acceptance)}

## Rules
- Work on ${task.id} only. Do not start other tasks.
- Run \`manifesto verify ${task.id}\` before finishing. Every check must pass.
- Commit your work before exiting.`;
}

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Review sheet for the agent that checks a worker's result. */
export function buildSupervisorPrompt(task: Task, options: SupervisorPromptOptions = {}): string {
  const now = options.now ?? (() => new Date());
  const summary = options.workerSummary ?? "[Worker summary will be inserted here after execution]";

  return `# Review: ${task.id} — ${taskTitle(task)}

**Worker:** ${options.workerName ?? "worker agent"}
**Completed:** ${timestamp(now())}

## Task
${task.description}

## Acceptance criteria
${formatAcceptanceCriteria(task.acceptance)}

## Worker summary
${summary}

## Verdict
- [ ] Approved
- [ ] Revisions required

### Feedback
[Your feedback here]

### Required revisions
1. [First revision if needed]
2. [Second revision if needed]
3. [Third revision if needed]

### Drift warnings
[Any drift warnings]

### Commendations
[What was done well]

### Next steps
[What should happen next]`;
}

/**
 * Render a prompt for a task in a manifest directory. Returns null for an
 * unknown task id. The manifesto itself is optional context.
 */
export function generatePrompt(
  manifestDir: string,
  taskId: string,
  type: PromptType,
  options: GeneratePromptOptions = {},
): string | null {
  const task = findTask(loadTasks(manifestDir, { logger: options.logger }), taskId);
  if (!task) return null;
  if (task.decodeIssue) {
    throw new InvalidTaskError(task.id, task.source_file, formatIssue(task.decodeIssue));
  }

  if (type === "supervisor") {
    return buildSupervisorPrompt(task, options);
  }
  const file = manifestoPath(manifestDir);
  const manifesto = existsSync(file) ? loadManifesto(file) : {};
  return buildWorkerPrompt(task, manifesto);
}
