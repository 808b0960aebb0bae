import { existsSync, readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import type { VerificationResult } from "../types.js";

const SKIPPED_DIRS = new Set(["node_modules", "DerivedData"]);

function isSkipped(relPath: string): boolean {
  return relPath.split(/[\\/]/).some((seg) => seg.startsWith(".") || SKIPPED_DIRS.has(seg));
}

/** Project-relative paths of every .swift file, sorted. Hidden and build directories are skipped. */
export function listSwiftFiles(projectDir: string): string[] {
  return readdirSync(projectDir, { recursive: true, encoding: "utf-8" })
    .filter((rel) => rel.endsWith(".swift") && !isSkipped(rel))
    .sort();
}

function fileIncludes(path: string, text: string): boolean {
  try {
    return readFileSync(path, "utf-8").includes(text);
  } catch {
    return false;
  }
}

/**
 * visionOS setup checks: some Swift source imports RealityKit, and
 * Package.swift (when present) declares the visionOS platform.
 */
export function checkVisionOsSetup(projectDir: string): VerificationResult {
  const results: VerificationResult = {};

  const importer = listSwiftFiles(projectDir).find((rel) =>
    fileIncludes(join(projectDir, rel), "import RealityKit"),
  );
  results.realitykit_imported = importer
    ? { passed: true, details: `Imported in ${importer}` }
    : { passed: false, details: "No .swift file imports RealityKit" };

  const pkg = join(projectDir, "Package.swift");
  if (existsSync(pkg)) {
    const declared = fileIncludes(pkg, "visionOS");
    results.visionos_platform = {
      passed: declared,
      details: declared
        ? "Package.swift declares visionOS"
        : "Package.swift does not declare visionOS",
    };
  }

  return results;
}
