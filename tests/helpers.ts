import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { stringify as yamlStringify } from "yaml";
import type { Logger, Task } from "../src/types.js";

const dirs: string[] = [];

/** Temp directory removed by `cleanupTempDirs`. */
export function makeTempDir(prefix = "manifesto-test-"): string {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  dirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const d of dirs) rmSync(d, { recursive: true, force: true });
  dirs.length = 0;
}

export function writeText(path: string, content: string): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, "utf-8");
  return path;
}

export function writeYaml(path: string, value: unknown): string {
  return writeText(path, yamlStringify(value));
}

export function baseManifesto(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    prd_id: "PRD-2026-TEST",
    title: "Test Project",
    status: "Draft",
    owner: "Test Owner",
    tech_stack: ["typescript"],
    metrics: {
      north_star: "Test metric",
      guardrails: [{ name: "Performance", target: "< 100ms" }],
    },
    ...overrides,
  };
}

export function makeTask(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    description: `Test task ${id}`,
    owner_role: "TEST-AGENT",
    depends_on: [],
    acceptance: {},
    source_file: "manifesto.yaml",
    ...overrides,
  };
}

export interface CapturedLogger extends Logger {
  infos: string[];
  warnings: string[];
}

export function captureLogger(): CapturedLogger {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info: (message) => infos.push(message),
    warn: (message) => warnings.push(message),
  };
}
