import { dirname, resolve } from "node:path";
import { loadConfig, resolveManifestDir } from "../config/loader.js";
import { manifestoPath } from "../manifesto/paths.js";
import type { ManifestoConfig } from "../types.js";

/** A project directory with its configuration resolved. Loaded fresh per invocation. */
export interface Workspace {
  projectDir: string;
  config: ManifestoConfig;
  manifestDir: string;
  manifestPath: string;
}

export interface WorkspaceOptions {
  /** Explicit manifesto.yaml; its directory replaces the configured manifestDir. */
  manifestPath?: string;
}

export function openWorkspace(
  projectDir: string = process.cwd(),
  options: WorkspaceOptions = {},
): Workspace {
  const config = loadConfig(projectDir);
  if (options.manifestPath) {
    const manifestPath = resolve(projectDir, options.manifestPath);
    return { projectDir, config, manifestDir: dirname(manifestPath), manifestPath };
  }

  const manifestDir = resolveManifestDir(projectDir, config);
  return {
    projectDir,
    config,
    manifestDir,
    manifestPath: manifestoPath(manifestDir),
  };
}
