import { readFileSync } from "node:fs";
import { parse as yamlParse } from "yaml";
import { ManifestNotFoundError, ParseError, errorMessage } from "../errors.js";

export function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

/** Parse a YAML file. Throws ParseError on malformed content; ENOENT propagates. */
export function readYamlFile(filePath: string): unknown {
  const raw = readFileSync(filePath, "utf-8");
  try {
    return yamlParse(raw);
  } catch (err) {
    throw new ParseError(filePath, errorMessage(err));
  }
}

/**
 * Load manifesto.yaml as an undecoded document.
 * Missing file and malformed YAML are both fatal here.
 */
export function loadManifesto(manifestPath: string): Record<string, unknown> {
  let data: unknown;
  try {
    data = readYamlFile(manifestPath);
  } catch (err) {
    if (isNotFound(err)) throw new ManifestNotFoundError(manifestPath);
    throw err;
  }

  if (!isRecord(data)) {
    throw new ParseError(manifestPath, "expected a YAML mapping at the top level");
  }
  return data;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
