import { spawnSync, type SpawnSyncReturns } from "node:child_process";

export interface ExecOptions {
  cwd: string;
  timeoutMs: number;
}

/** Outcome of a bounded child process. Never thrown. */
export interface ExecResult {
  /** Null when the process was killed or never started. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Spawn failure or timeout reason. */
  error?: string;
}

const MAX_BUFFER = 10 * 1024 * 1024;

function toResult(result: SpawnSyncReturns<string>, timeoutMs: number): ExecResult {
  const timedOut =
    result.error !== undefined && "code" in result.error && result.error.code === "ETIMEDOUT";
  const out: ExecResult = {
    exitCode: result.status,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    timedOut,
  };
  if (timedOut) {
    out.error = `Timed out after ${timeoutMs}ms`;
  } else if (result.error) {
    out.error = result.error.message;
  }
  return out;
}

/** Run a command line through the system shell. */
export function execShell(command: string, options: ExecOptions): ExecResult {
  const result = spawnSync(command, {
    cwd: options.cwd,
    shell: true,
    encoding: "utf-8",
    timeout: options.timeoutMs,
    maxBuffer: MAX_BUFFER,
  });
  return toResult(result, options.timeoutMs);
}

/** Run an executable directly, without a shell. */
export function execFile(file: string, args: string[], options: ExecOptions): ExecResult {
  const result = spawnSync(file, args, {
    cwd: options.cwd,
    encoding: "utf-8",
    timeout: options.timeoutMs,
    maxBuffer: MAX_BUFFER,
  });
  return toResult(result, options.timeoutMs);
}
