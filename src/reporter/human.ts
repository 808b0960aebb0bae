import type { DependencyIssue } from "../plan/dependencies.js";
import type { PlanValidation } from "../plan/planner.js";
import type {
  Plan,
  Proof,
  ValidationResult,
  VerificationOutcome,
  VerificationResult,
} from "../types.js";

function checkLines(results: VerificationResult): string[] {
  return Object.entries(results).map(([name, result]) => {
    const icon = result.passed ? "[x]" : "[ ]";
    const status = result.passed ? "PASS" : "FAIL";
    const details = result.details ? ` — ${result.details}` : "";
    return `- ${icon} ${name}: ${status}${details}`;
  });
}

export function formatVerificationReport(outcome: VerificationOutcome): string {
  const lines: string[] = [];
  const entries = Object.entries(outcome.results);
  const passedCount = entries.filter(([, r]) => r.passed).length;

  lines.push(`## Task ${outcome.taskId} Verification`);
  lines.push(`**Status:** ${outcome.passed ? "PASSED" : "FAILED"}`);
  lines.push(`**Checks:** ${passedCount}/${entries.length} passed`);
  lines.push("");

  lines.push("### Checks");
  if (entries.length === 0) {
    lines.push("- (no acceptance criteria declared)");
  }
  lines.push(...checkLines(outcome.results));

  if (outcome.proofPath) {
    lines.push("");
    lines.push(`**Proof:** ${outcome.proofPath}`);
  }

  return lines.join("\n");
}

function formatIssues(issues: DependencyIssue[]): string[] {
  if (issues.length === 0) return [];
  return ["", "### Dependency Warnings", ...issues.map((i) => `- ${i.message}`)];
}

export function formatValidationReport(
  result: ValidationResult,
  taskCount: number,
  issues: DependencyIssue[],
): string {
  const lines: string[] = [];
  lines.push("## Manifesto Validation");
  if (result.valid) {
    lines.push(`**Status:** VALID`);
    lines.push(`**Tasks:** ${taskCount}`);
  } else {
    lines.push(`**Status:** INVALID`);
    lines.push(`- ${result.error.message}`);
  }
  lines.push(...formatIssues(issues));
  return lines.join("\n");
}

export function formatPlanReport(
  plan: Plan,
  validation: PlanValidation,
  issues: DependencyIssue[],
  planFile?: string,
): string {
  const lines: string[] = [];
  lines.push(`## Plan: ${plan.title} (${plan.prd_id})`);
  lines.push(`**Status:** ${validation.valid ? "VALID" : "INVALID"}`);
  if (!validation.valid) {
    lines.push(`- ${validation.reason}`);
  }
  lines.push("");

  lines.push("### Tasks");
  plan.tasks.forEach((task, i) => {
    const deps = task.depends_on.length > 0 ? ` (after ${task.depends_on.join(", ")})` : "";
    lines.push(`${i + 1}. ${task.id} [${task.owner_role}] ${task.description}${deps}`);
  });

  lines.push(...formatIssues(issues));

  if (planFile) {
    lines.push("");
    lines.push(`**Written:** ${planFile}`);
    lines.push("Review it, then run `manifesto execute --approve`.");
  }
  return lines.join("\n");
}

export interface StatusSummary {
  title: string;
  status: string;
  taskIds: string[];
  proofs: Map<string, Proof>;
}

export function formatStatusReport(summary: StatusSummary): string {
  const lines: string[] = [];
  lines.push("## Manifesto Status");
  lines.push(`**Project:** ${summary.title}`);
  lines.push(`**Status:** ${summary.status}`);
  lines.push(`**Tasks:** ${summary.taskIds.length} (${summary.proofs.size} verified)`);

  if (summary.taskIds.length > 0) {
    lines.push("");
    for (const id of summary.taskIds) {
      const proof = summary.proofs.get(id);
      const icon = proof ? "[x]" : "[ ]";
      const when = proof ? ` — verified ${proof.timestamp}` : "";
      lines.push(`- ${icon} ${id}${when}`);
    }
  }
  return lines.join("\n");
}

export function formatPlatformReport(results: VerificationResult): string {
  return ["## visionOS Setup", ...checkLines(results)].join("\n");
}
