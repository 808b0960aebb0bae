// ── Setup Templates ─────────────────────────────────────────────────
// Document builders used by `manifesto init` to scaffold a project.

import { stringify as yamlStringify } from "yaml";
import type { TestRunnerKind } from "../types.js";

export interface SetupContext {
  projectName: string;
  /** visionos, swift, node, python, or any other stack name. */
  projectType: string;
  date: Date;
  engineVersion: string;
}

interface TemplateTask {
  id: string;
  description: string;
  owner_role: string;
  depends_on: string[];
  acceptance: Record<string, unknown>;
}

const SWIFT_TYPES = new Set(["visionos", "swift", "ios", "macos"]);
const NODE_TYPES = new Set(["node", "typescript", "javascript"]);

function isSwift(ctx: SetupContext): boolean {
  return SWIFT_TYPES.has(ctx.projectType.toLowerCase());
}

function isNode(ctx: SetupContext): boolean {
  return NODE_TYPES.has(ctx.projectType.toLowerCase());
}

/** PRD-2026-ABC, with an -AVP suffix for visionOS projects. */
export function projectId(ctx: SetupContext): string {
  const code = ctx.projectName.toUpperCase().replace(/[^A-Z0-9]/g, "").slice(0, 3) || "PRJ";
  const suffix = ctx.projectType.toLowerCase() === "visionos" ? "-AVP" : "";
  return `PRD-${ctx.date.getFullYear()}-${code}${suffix}`;
}

function techStack(ctx: SetupContext): string[] {
  if (ctx.projectType.toLowerCase() === "visionos") {
    return ["swift", "visionos", "realitykit", "arkit"];
  }
  return [ctx.projectType];
}

function guardrails(ctx: SetupContext): Array<Record<string, string>> {
  const base = [
    { name: "Load time", target: "< 2s", measurement: "Time to first interactive frame" },
    { name: "Crash-free sessions", target: "> 99.8%", measurement: "Sessions without fatal errors" },
  ];
  if (ctx.projectType.toLowerCase() !== "visionos") return base;
  return [
    ...base,
    { name: "Frame rate", target: ">= 90 fps", measurement: "RealityKit performance profiler" },
    { name: "Thermal state", target: "nominal", measurement: "Peak 5-minute usage" },
  ];
}

function starterTasks(ctx: SetupContext): TemplateTask[] {
  const role = "DEV-AGENT";
  const src = `Sources/${ctx.projectName}`;

  if (ctx.projectType.toLowerCase() === "visionos") {
    return [
      {
        id: "TASK-001",
        description: "Initialize visionos project structure",
        owner_role: role,
        depends_on: [],
        acceptance: { file_exists: ["Package.swift", `${src}/App.swift`, `${src}/ContentView.swift`] },
      },
      {
        id: "TASK-002",
        description: "Create immersive space entry point",
        owner_role: role,
        depends_on: ["TASK-001"],
        acceptance: {
          file_contains: { [`${src}/App.swift`]: "ImmersiveSpace" },
          command_succeeds: ["swift build"],
        },
      },
      {
        id: "TASK-003",
        description: "Set up RealityKit scene",
        owner_role: role,
        depends_on: ["TASK-002"],
        acceptance: {
          file_exists: [`${src}/ImmersiveView.swift`],
          file_contains: { [`${src}/ImmersiveView.swift`]: "RealityView" },
        },
      },
    ];
  }

  if (isSwift(ctx)) {
    return [
      {
        id: "TASK-001",
        description: `Initialize ${ctx.projectType} package structure`,
        owner_role: role,
        depends_on: [],
        acceptance: { file_exists: ["Package.swift"], command_succeeds: ["swift build"] },
      },
    ];
  }

  if (isNode(ctx)) {
    return [
      {
        id: "TASK-001",
        description: `Initialize ${ctx.projectType} project structure`,
        owner_role: role,
        depends_on: [],
        acceptance: { file_exists: ["package.json"] },
      },
      {
        id: "TASK-002",
        description: "Add a first passing test",
        owner_role: "TEST-AGENT",
        depends_on: ["TASK-001"],
        acceptance: { command_succeeds: ["npm test"] },
      },
    ];
  }

  return [
    {
      id: "TASK-001",
      description: `Initialize ${ctx.projectType} project structure`,
      owner_role: role,
      depends_on: [],
      acceptance: { file_exists: ["README.md"] },
    },
  ];
}

/** The manifesto document, before serialization. */
export function manifestoDocument(ctx: SetupContext): Record<string, unknown> {
  const doc: Record<string, unknown> = {
    prd_id: projectId(ctx),
    title: ctx.projectName,
    status: "Draft",
    owner: "AI Orchestrator",
    stakeholders: ["Product", "Engineering", "Design"],
    target_release: "TBD",
    tech_stack: techStack(ctx),
    metrics: {
      north_star: "User engagement rate",
      guardrails: guardrails(ctx),
    },
    tasks: starterTasks(ctx),
  };
  if (isSwift(ctx)) {
    doc.checklists = {
      swift: [
        "No force unwrapping (!)",
        "Memory management verified",
        "Error handling implemented",
        "Performance within budget",
      ],
    };
  }
  return doc;
}

// ── manifesto.yaml ──────────────────────────────────────────────────

export function manifestoTemplate(ctx: SetupContext): string {
  const header = [
    "# Project manifesto. Header is generated; everything below is yours to edit.",
    `# Generated: ${ctx.date.toISOString().slice(0, 10)}`,
    `# Engine Version: ${ctx.engineVersion}`,
    "# Tasks: maximum 8, each description 12 words or fewer.",
    "",
  ].join("\n");
  return `${header}\n${yamlStringify(manifestoDocument(ctx))}`;
}

// ── README.md ───────────────────────────────────────────────────────

export function manifestoReadmeTemplate(ctx: SetupContext): string {
  return `# ${ctx.projectName} Manifesto

Project orchestration documents for AI agents.

## Structure
- \`manifesto.yaml\` - Main project contract
- \`tasks/\` - Per-task files (\`TASK-###.yaml\`) and completion proofs
- \`reviews/\` - Code review results
- \`plan.json\` - Frozen plan written by \`manifesto plan\`

## Usage
\`\`\`bash
manifesto verify TASK-001
manifesto status
manifesto plan
manifesto execute --approve
\`\`\`
`;
}

// ── .manifesto.json ─────────────────────────────────────────────────

export function testRunnerFor(ctx: SetupContext): { testRunner: TestRunnerKind; testCommand?: string } {
  if (isSwift(ctx)) return { testRunner: "swift" };
  if (isNode(ctx)) return { testRunner: "node" };
  if (ctx.projectType.toLowerCase() === "python") {
    return { testRunner: "shell", testCommand: "pytest -k {selector}" };
  }
  return { testRunner: "none" };
}

export function configTemplate(ctx: SetupContext, manifestDir: string): string {
  const config: Record<string, unknown> = {
    manifestDir,
    ...testRunnerFor(ctx),
  };
  return JSON.stringify(config, null, 2) + "\n";
}
