import { join } from "node:path";

export const DEFAULT_MANIFEST_DIR = join("docs", "_MANIFESTO");
export const MANIFESTO_FILE = "manifesto.yaml";
export const EMBEDDED_SOURCE = MANIFESTO_FILE;

export function manifestoPath(manifestDir: string): string {
  return join(manifestDir, MANIFESTO_FILE);
}

export function tasksDir(manifestDir: string): string {
  return join(manifestDir, "tasks");
}

export function proofPath(manifestDir: string, taskId: string): string {
  return join(tasksDir(manifestDir), `${taskId}_proof.json`);
}

export function planPath(manifestDir: string): string {
  return join(manifestDir, "plan.json");
}
