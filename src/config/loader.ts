import { readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { ParseError, errorMessage } from "../errors.js";
import { isNotFound } from "../manifesto/reader.js";
import { describeIssue } from "../manifesto/schemas.js";
import type { ManifestoConfig } from "../types.js";
import { CONFIG_FILE, manifestoConfigSchema } from "./schema.js";

/**
 * Load .manifesto.json from the project root, applying defaults.
 * A missing file yields the defaults; a malformed one throws.
 */
export function loadConfig(projectDir: string = process.cwd()): ManifestoConfig {
  const configPath = join(projectDir, CONFIG_FILE);
  let raw: unknown = {};

  try {
    const content = readFileSync(configPath, "utf-8");
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new ParseError(configPath, errorMessage(err));
    }
  } catch (err) {
    if (!isNotFound(err)) throw err;
    // No config file — use defaults
  }

  const parsed = manifestoConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError(configPath, describeIssue(parsed.error));
  }
  return parsed.data;
}

/** Absolute manifest directory for a project. */
export function resolveManifestDir(projectDir: string, config: ManifestoConfig): string {
  return resolve(projectDir, config.manifestDir);
}
