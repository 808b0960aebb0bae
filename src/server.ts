import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { generatePrompt } from "./prompts/generator.js";
import type { Logger } from "./types.js";
import { buildPlan } from "./tools/build-plan.js";
import { checkWorkspace } from "./tools/validate-manifesto.js";
import { verifyWorkspaceTask } from "./tools/verify-task.js";
import { openWorkspace } from "./tools/workspace.js";
import { stderrLogger } from "./utils/logger.js";

type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

function errorResult(err: unknown): ToolResult {
  return {
    content: [{ type: "text" as const, text: `Error: ${errorMessage(err)}` }],
    isError: true,
  };
}

const projectDirArg = z.string().optional().describe("Project directory (defaults to cwd)");

/**
 * Create an MCP server exposing manifesto verification, validation, planning
 * and task prompts.
 * Exported for testing — call `startServer()` to run with stdio transport.
 */
export function createServer(logger: Logger = stderrLogger): McpServer {
  const server = new McpServer(
    { name: "manifesto", version: "0.1.0" },
    { capabilities: { tools: {} } },
  );

  server.tool(
    "manifesto_verify_task",
    "Verify one task's acceptance criteria; records a proof when every check passes",
    {
      taskId: z.string().describe("Task id, e.g. TASK-001"),
      projectDir: projectDirArg,
    },
    async ({ taskId, projectDir }) => {
      try {
        const ws = openWorkspace(projectDir ?? process.cwd());
        return jsonResult(verifyWorkspaceTask(ws, taskId, { logger }));
      } catch (err) {
        return errorResult(err);
      }
    },
  );

  server.tool(
    "manifesto_validate",
    "Validate the manifesto and its tasks against schema and policy limits",
    { projectDir: projectDirArg },
    async ({ projectDir }) => {
      try {
        const check = checkWorkspace(openWorkspace(projectDir ?? process.cwd()), { logger });
        return jsonResult({ ...check.result, dependencyIssues: check.dependencyIssues });
      } catch (err) {
        return errorResult(err);
      }
    },
  );

  server.tool(
    "manifesto_plan",
    "Generate and validate a plan. Writes plan.json only when write is true and the plan is valid",
    {
      projectDir: projectDirArg,
      write: z.boolean().optional().describe("Persist plan.json (default false)"),
    },
    async ({ projectDir, write }) => {
      try {
        const ws = openWorkspace(projectDir ?? process.cwd());
        return jsonResult(buildPlan(ws, { logger, write: write === true }));
      } catch (err) {
        return errorResult(err);
      }
    },
  );

  server.tool(
    "manifesto_prompt",
    "Render the worker or supervisor prompt for a task",
    {
      taskId: z.string().describe("Task id, e.g. TASK-001"),
      type: z.enum(["worker", "supervisor"]).optional().describe("Prompt type (default worker)"),
      workerSummary: z.string().optional().describe("Worker summary for a supervisor prompt"),
      projectDir: projectDirArg,
    },
    async ({ taskId, type, workerSummary, projectDir }) => {
      try {
        const ws = openWorkspace(projectDir ?? process.cwd());
        const prompt = generatePrompt(ws.manifestDir, taskId, type ?? "worker", {
          workerSummary,
          logger,
        });
        if (prompt === null) {
          return errorResult(new Error(`Task ${taskId} not found`));
        }
        return { content: [{ type: "text" as const, text: prompt }] };
      } catch (err) {
        return errorResult(err);
      }
    },
  );

  return server;
}

/** Start the MCP server on stdio transport. */
async function startServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

// Run when executed directly
const isMain =
  typeof process !== "undefined" &&
  process.argv[1] &&
  (process.argv[1].endsWith("/server.js") || process.argv[1].endsWith("\\server.js"));

if (isMain) {
  startServer().catch((err) => {
    process.stderr.write(`Manifesto MCP server error: ${String(err)}\n`);
    process.exit(1);
  });
}
