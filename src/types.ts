import type { z } from "zod";
import type {
  FieldIssue,
  acceptanceCriteriaSchema,
  guardrailSchema,
  manifestoSchema,
  manifestoStatusEnum,
  planSchema,
  planTaskSchema,
  proofSchema,
} from "./manifesto/schemas.js";

export type { FieldIssue };

/** Manifesto lifecycle status. */
export type ManifestoStatus = z.infer<typeof manifestoStatusEnum>;

/** Declarative success conditions. Every present clause must hold. */
export type AcceptanceCriteria = z.infer<typeof acceptanceCriteriaSchema>;

export type Guardrail = z.infer<typeof guardrailSchema>;

/** Parsed and structurally valid manifesto.yaml. */
export type Manifesto = z.infer<typeof manifestoSchema>;

/** One atomic unit of work, as loaded from storage. */
export interface Task {
  /** Unique identifier, `TASK-###`. */
  id: string;
  title?: string;
  description: string;
  owner_role: string;
  /** Advisory ordering hints. May name tasks that are not loaded. */
  depends_on: string[];
  /** How the task serves the project vision. */
  vision_link?: string;
  acceptance: AcceptanceCriteria;
  /** Where the task was read from. Diagnostics only, not part of identity. */
  source_file: string;
  /**
   * Set when the stored task has an id but does not fit the task shape.
   * The other fields are then placeholders and the task must not be run.
   */
  decodeIssue?: FieldIssue;
}

/** Outcome of one named check. */
export interface CheckResult {
  passed: boolean;
  details: string;
}

/** Check name -> outcome. Insertion order follows evaluation order. */
export type VerificationResult = Record<string, CheckResult>;

/** Aggregate outcome of evaluating one task's acceptance criteria. */
export interface VerificationOutcome {
  taskId: string;
  /** AND over every recorded check; true when nothing was recorded. */
  passed: boolean;
  results: VerificationResult;
  /** Path of the proof written on success, absent otherwise. */
  proofPath?: string;
}

/** Tamper-evidence record for a successful verification. */
export type Proof = z.infer<typeof proofSchema>;

export type PlanTask = z.infer<typeof planTaskSchema>;

/** Frozen snapshot consumed by the execute stage. */
export type Plan = z.infer<typeof planSchema>;

/** Hard limits applied to the task set. */
export interface PolicyLimits {
  maxTasks: number;
  maxDescriptionWords: number;
  maxDescriptionLength: number;
}

/** Structural or policy violation. Validation stops at the first one. */
export interface ValidationError {
  type:
    | "schema_error"
    | "task_schema_error"
    | "task_limit"
    | "description_length"
    | "description_words";
  message: string;
  /** Contextual data: field path, actual value and limit where relevant. */
  context: Record<string, unknown>;
}

export type ValidationResult =
  | { valid: true; manifesto: Manifesto }
  | { valid: false; error: ValidationError };

/** Output sink shared by the core components. */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

/** Runs an ecosystem's tests for a selector. */
export interface TestRunner {
  readonly name: string;
  runTests(selector: string): TestRunResult;
}

export interface TestRunResult {
  passed: boolean;
  /** stdout + stderr, or the failure reason when the runner could not start. */
  output: string;
}

export type TestRunnerKind = "swift" | "node" | "shell" | "none";

/** Configuration from .manifesto.json */
export interface ManifestoConfig {
  manifestDir: string;
  testRunner: TestRunnerKind;
  testCommand?: string;
  commandTimeoutMs: number;
  testTimeoutMs: number;
  limits: PolicyLimits;
}
