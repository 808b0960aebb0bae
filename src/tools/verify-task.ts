import { loadTasks } from "../manifesto/task-store.js";
import type { Logger, Task, VerificationOutcome } from "../types.js";
import { verifyTask } from "../verify/evaluator.js";
import { createTestRunner } from "../verify/runners.js";
import type { Workspace } from "./workspace.js";

/**
 * Verify one task with the workspace's runner and timeouts.
 * `tasks` overrides loading, e.g. to verify the tasks frozen in a plan.
 */
export function verifyWorkspaceTask(
  ws: Workspace,
  taskId: string,
  options: { logger?: Logger; tasks?: ReadonlyArray<Pick<Task, "id" | "acceptance">> } = {},
): VerificationOutcome {
  const tasks = options.tasks ?? loadTasks(ws.manifestDir, { logger: options.logger });
  return verifyTask(tasks, taskId, {
    manifestDir: ws.manifestDir,
    projectDir: ws.projectDir,
    testRunner: createTestRunner(ws.config, ws.projectDir),
    commandTimeoutMs: ws.config.commandTimeoutMs,
  });
}
