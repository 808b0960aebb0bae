import { checkDependencies, type DependencyIssue } from "../plan/dependencies.js";
import { generatePlan, validatePlan, writePlan, type PlanValidation } from "../plan/planner.js";
import type { Logger, Plan } from "../types.js";
import type { Workspace } from "./workspace.js";

export interface PlanBuild {
  plan: Plan;
  validation: PlanValidation;
  dependencyIssues: DependencyIssue[];
  /** Set only when the plan was valid and persisted. */
  planFile?: string;
}

/** Generate and validate a plan; persist it only when valid. */
export function buildPlan(ws: Workspace, options: { logger?: Logger; write?: boolean } = {}): PlanBuild {
  const plan = generatePlan(ws.manifestPath, { logger: options.logger });
  const validation = validatePlan(plan, ws.config.limits);
  const build: PlanBuild = {
    plan,
    validation,
    dependencyIssues: checkDependencies(plan.tasks),
  };
  if (validation.valid && options.write !== false) {
    build.planFile = writePlan(ws.manifestDir, plan);
  }
  return build;
}
