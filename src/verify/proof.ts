import { createHash, randomUUID } from "node:crypto";
import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { ParseError, errorMessage } from "../errors.js";
import { isNotFound } from "../manifesto/reader.js";
import { proofPath } from "../manifesto/paths.js";
import { describeIssue, proofSchema } from "../manifesto/schemas.js";
import type { Proof, Task, VerificationResult } from "../types.js";

/** Digest recorded for a referenced file that could not be read. */
export const HASH_ERROR = "error";

export interface RecordProofOptions {
  /** Base for relative paths in the task's file_exists clause. */
  projectDir?: string;
  now?: () => Date;
}

/** SHA-256 of a file's bytes, or HASH_ERROR when it cannot be read. */
export function hashFile(filePath: string): string {
  try {
    return createHash("sha256").update(readFileSync(filePath)).digest("hex");
  } catch {
    return HASH_ERROR;
  }
}

/** Write via temp file + rename so a reader never sees a partial document. */
export function atomicWriteJson(targetPath: string, value: unknown): void {
  mkdirSync(dirname(targetPath), { recursive: true });
  const temp = `${targetPath}.${randomUUID()}.tmp`;
  writeFileSync(temp, JSON.stringify(value, null, 2) + "\n", "utf-8");
  renameSync(temp, targetPath);
}

/**
 * Persist a proof of a successful verification to
 * `<manifestDir>/tasks/<id>_proof.json`, replacing any earlier one.
 * File hashes are keyed by the path exactly as the task declares it.
 */
export function recordProof(
  manifestDir: string,
  task: Pick<Task, "id" | "acceptance">,
  results: VerificationResult,
  options: RecordProofOptions = {},
): { proof: Proof; path: string } {
  const projectDir = options.projectDir ?? process.cwd();
  const now = options.now ?? (() => new Date());

  const fileHashes: Record<string, string> = {};
  for (const file of task.acceptance.file_exists ?? []) {
    fileHashes[file] = hashFile(resolve(projectDir, file));
  }

  const proof: Proof = {
    task_id: task.id,
    timestamp: now().toISOString(),
    results,
    file_hashes: fileHashes,
  };

  const path = proofPath(manifestDir, task.id);
  atomicWriteJson(path, proof);
  return { proof, path };
}

/** Read a task's proof. Null when none has been recorded. */
export function readProof(manifestDir: string, taskId: string): Proof | null {
  const path = proofPath(manifestDir, taskId);
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ParseError(path, errorMessage(err));
  }
  const parsed = proofSchema.safeParse(data);
  if (!parsed.success) throw new ParseError(path, describeIssue(parsed.error));
  return parsed.data;
}
