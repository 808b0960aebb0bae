/**
 * Errors raised while loading manifests, tasks and plans.
 * Per-check verification failures are never thrown; they are recorded in the results map.
 */

/** A YAML or JSON document could not be parsed or decoded. */
export class ParseError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string,
  ) {
    super(`Failed to parse ${filePath}: ${reason}`);
    this.name = "ParseError";
  }
}

/** Two loaded tasks share an id. Aborts the whole load. */
export class DuplicateTaskIdError extends Error {
  constructor(
    public readonly taskId: string,
    public readonly firstSource: string,
    public readonly secondSource: string,
  ) {
    super(`Duplicate task ID '${taskId}' in files: ${firstSource} and ${secondSource}`);
    this.name = "DuplicateTaskIdError";
  }
}

/** A task that does not fit the task shape was handed to an operation that runs tasks. */
export class InvalidTaskError extends Error {
  constructor(
    public readonly taskId: string,
    public readonly sourceFile: string,
    public readonly reason: string,
  ) {
    super(`Invalid task ${taskId} (${sourceFile}): ${reason}`);
    this.name = "InvalidTaskError";
  }
}

export class ManifestNotFoundError extends Error {
  constructor(public readonly manifestPath: string) {
    super(`Manifesto not found at ${manifestPath}`);
    this.name = "ManifestNotFoundError";
  }
}

export class PlanNotFoundError extends Error {
  constructor(public readonly planPath: string) {
    super(`No plan found at ${planPath}. Run \`manifesto plan\` first.`);
    this.name = "PlanNotFoundError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
