export * from "./types.js";
export * from "./errors.js";
export { loadConfig, resolveManifestDir } from "./config/loader.js";
export { loadManifesto } from "./manifesto/reader.js";
export { loadTasks, loadTaskFile, checkDuplicateIds, findTask } from "./manifesto/task-store.js";
export { validateManifesto, countWords, DEFAULT_LIMITS } from "./manifesto/validator.js";
export { evaluateAcceptance, verifyTask, allPassed } from "./verify/evaluator.js";
export {
  createTestRunner,
  swiftTestRunner,
  nodeTestRunner,
  shellTestRunner,
  noTestRunner,
} from "./verify/runners.js";
export { recordProof, readProof, hashFile } from "./verify/proof.js";
export {
  generatePlan,
  validatePlan,
  writePlan,
  readPlan,
  executePlan,
  type ExecutionResult,
  type PlanValidation,
  type TaskExecutor,
} from "./plan/planner.js";
export { checkDependencies, detectCycle, type DependencyIssue } from "./plan/dependencies.js";
export { injectManifesto } from "./setup/inject.js";
export {
  buildSupervisorPrompt,
  buildWorkerPrompt,
  formatAcceptanceCriteria,
  generatePrompt,
  type PromptType,
} from "./prompts/generator.js";
export { checkVisionOsSetup } from "./verify/platform.js";
