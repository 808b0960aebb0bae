import { existsSync } from "node:fs";
import { join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, describe, expect, it } from "vitest";
import { createServer } from "../../src/server.js";
import {
  baseManifesto,
  captureLogger,
  cleanupTempDirs,
  makeTempDir,
  writeText,
  writeYaml,
} from "../helpers.js";

async function connect(): Promise<{ client: Client; close: () => Promise<void> }> {
  const server = createServer(captureLogger());
  const client = new Client({ name: "test-client", version: "1.0.0" });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

  return {
    client,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

/** First text block of a tool result. */
function firstText(result: unknown): string {
  if (typeof result !== "object" || result === null || !("content" in result)) return "";
  const { content } = result;
  if (!Array.isArray(content)) return "";
  const block: unknown = content[0];
  if (typeof block === "object" && block !== null && "text" in block && typeof block.text === "string") {
    return block.text;
  }
  return "";
}

function makeProject(): string {
  const projectDir = makeTempDir();
  writeText(join(projectDir, ".manifesto.json"), JSON.stringify({ testRunner: "none" }));
  writeText(join(projectDir, "README.md"), "# Demo\n");
  writeYaml(
    join(projectDir, "docs", "_MANIFESTO", "manifesto.yaml"),
    baseManifesto({
      tasks: [
        {
          id: "TASK-001",
          description: "Write the readme",
          owner_role: "DOC-AGENT",
          acceptance: { file_exists: ["README.md"] },
        },
      ],
    }),
  );
  return projectDir;
}

afterEach(() => {
  cleanupTempDirs();
});

describe("MCP server", () => {
  it("lists the manifesto tools", async () => {
    const { client, close } = await connect();

    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "manifesto_plan",
      "manifesto_prompt",
      "manifesto_validate",
      "manifesto_verify_task",
    ]);

    await close();
  });

  it("verifies a task and records its proof", async () => {
    const projectDir = makeProject();
    const { client, close } = await connect();

    const result = await client.callTool({
      name: "manifesto_verify_task",
      arguments: { taskId: "TASK-001", projectDir },
    });

    expect(result.isError).toBeFalsy();
    expect(JSON.parse(firstText(result))).toEqual({
      taskId: "TASK-001",
      passed: true,
      results: { "file_README.md": { passed: true, details: "Found: README.md" } },
      proofPath: join(projectDir, "docs", "_MANIFESTO", "tasks", "TASK-001_proof.json"),
    });

    await close();
  });

  it("validates the manifesto", async () => {
    const projectDir = makeProject();
    const { client, close } = await connect();

    const result = await client.callTool({ name: "manifesto_validate", arguments: { projectDir } });
    const body: unknown = JSON.parse(firstText(result));

    expect(body).toMatchObject({ valid: true, dependencyIssues: [] });

    await close();
  });

  it("builds a plan without writing it by default", async () => {
    const projectDir = makeProject();
    const { client, close } = await connect();

    const result = await client.callTool({ name: "manifesto_plan", arguments: { projectDir } });
    const body: unknown = JSON.parse(firstText(result));

    expect(body).toMatchObject({
      plan: { prd_id: "PRD-2026-TEST", tasks: [{ id: "TASK-001" }] },
      validation: { valid: true },
    });
    expect(existsSync(join(projectDir, "docs", "_MANIFESTO", "plan.json"))).toBe(false);

    await close();
  });

  it("writes plan.json when asked", async () => {
    const projectDir = makeProject();
    const { client, close } = await connect();

    await client.callTool({ name: "manifesto_plan", arguments: { projectDir, write: true } });
    expect(existsSync(join(projectDir, "docs", "_MANIFESTO", "plan.json"))).toBe(true);

    await close();
  });

  it("renders a worker prompt for a task", async () => {
    const projectDir = makeProject();
    const { client, close } = await connect();

    const result = await client.callTool({
      name: "manifesto_prompt",
      arguments: { taskId: "TASK-001", projectDir },
    });

    expect(result.isError).toBeFalsy();
    expect(firstText(result).startsWith("# Task: TASK-001 — Write the readme\n")).toBe(true);

    await close();
  });

  it("reports an unknown task to the prompt tool as an error", async () => {
    const projectDir = makeProject();
    const { client, close } = await connect();

    const result = await client.callTool({
      name: "manifesto_prompt",
      arguments: { taskId: "TASK-404", projectDir },
    });

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe("Error: Task TASK-404 not found");

    await close();
  });

  it("reports a malformed task as invalid", async () => {
    const projectDir = makeProject();
    writeYaml(join(projectDir, "docs", "_MANIFESTO", "tasks", "TASK-001.yaml"), {
      id: "TASK-001",
      description: 42,
      owner_role: "DOC-AGENT",
    });
    const { client, close } = await connect();

    const result = await client.callTool({ name: "manifesto_validate", arguments: { projectDir } });
    const body: unknown = JSON.parse(firstText(result));

    expect(body).toMatchObject({
      valid: false,
      error: { type: "task_schema_error", context: { taskId: "TASK-001", field: "description" } },
    });

    await close();
  });

  it("returns an error result when there is no manifesto", async () => {
    const projectDir = makeTempDir();
    const { client, close } = await connect();

    const result = await client.callTool({ name: "manifesto_validate", arguments: { projectDir } });

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe(
      `Error: Manifesto not found at ${join(projectDir, "docs", "_MANIFESTO", "manifesto.yaml")}`,
    );

    await close();
  });
});
