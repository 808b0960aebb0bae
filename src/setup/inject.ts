import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join, relative } from "node:path";
import { CONFIG_FILE } from "../config/schema.js";
import { manifestoPath, tasksDir } from "../manifesto/paths.js";
import {
  configTemplate,
  manifestoReadmeTemplate,
  manifestoTemplate,
  type SetupContext,
} from "./templates.js";

export interface InjectOptions {
  /** Absolute manifest directory. */
  manifestDir: string;
  /** Replace an existing manifesto.yaml. */
  force?: boolean;
}

export interface InjectResult {
  manifestDir: string;
  /** Paths written, relative to the project directory. */
  created: string[];
}

/**
 * Scaffold the manifest directory: manifesto.yaml, README.md, tasks/ and
 * reviews/ (each with .gitkeep), plus .manifesto.json when none exists.
 */
export function injectManifesto(
  projectDir: string,
  ctx: SetupContext,
  options: InjectOptions,
): InjectResult {
  const { manifestDir } = options;
  const manifestFile = manifestoPath(manifestDir);
  if (existsSync(manifestFile) && !options.force) {
    throw new Error(`${manifestFile} already exists (use --force to overwrite)`);
  }

  const created: string[] = [];
  const write = (path: string, content: string): void => {
    writeFileSync(path, content, "utf-8");
    created.push(relative(projectDir, path));
  };

  mkdirSync(manifestDir, { recursive: true });
  write(manifestFile, manifestoTemplate(ctx));
  write(join(manifestDir, "README.md"), manifestoReadmeTemplate(ctx));

  for (const dir of [tasksDir(manifestDir), join(manifestDir, "reviews")]) {
    mkdirSync(dir, { recursive: true });
    const keep = join(dir, ".gitkeep");
    if (!existsSync(keep)) write(keep, "");
  }

  const configPath = join(projectDir, CONFIG_FILE);
  if (!existsSync(configPath)) {
    write(configPath, configTemplate(ctx, relative(projectDir, manifestDir)));
  }

  return { manifestDir, created };
}
