import { loadManifesto } from "../manifesto/reader.js";
import { loadTasks } from "../manifesto/task-store.js";
import { validateManifesto } from "../manifesto/validator.js";
import { checkDependencies, type DependencyIssue } from "../plan/dependencies.js";
import type { Logger, Task, ValidationResult } from "../types.js";
import type { Workspace } from "./workspace.js";

export interface ManifestoCheck {
  result: ValidationResult;
  tasks: Task[];
  /** Advisory only; never affects `result`. */
  dependencyIssues: DependencyIssue[];
}

/** Load manifesto and tasks, then run schema, policy and dependency checks. */
export function checkWorkspace(ws: Workspace, options: { logger?: Logger } = {}): ManifestoCheck {
  const document = loadManifesto(ws.manifestPath);
  const tasks = loadTasks(ws.manifestDir, { logger: options.logger });
  return {
    result: validateManifesto(document, tasks, ws.config.limits),
    tasks,
    dependencyIssues: checkDependencies(tasks),
  };
}
