/**
 * MCP server: loads a project folder, builds the schema registry and model
 * cache, and serves the compilation tools over stdio.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadProject } from "../project/loader.ts";
import { compilerOptionsFrom } from "../types/config.ts";
import { ModelCache } from "../cache/model-cache.ts";
import { DatasetAssembler } from "../assembler/dataset-assembler.ts";
import { registerTools } from "./tools.ts";
import { VERSION } from "../version.ts";

export async function startServer(projectPath: string): Promise<void> {
  console.error(`[annomodels] Loading project from: ${projectPath}`);

  const project = await loadProject(projectPath);
  console.error(
    `[annomodels] Loaded project "${project.name}" with ` +
    `${project.registry.validNames().size} schema(s), root model ${project.config.rootModel}`,
  );

  const cache = new ModelCache();
  const assembler = new DatasetAssembler(
    project.registry,
    cache,
    compilerOptionsFrom(project.config),
  );

  const server = new McpServer(
    { name: `annomodels:${project.name}`, version: VERSION },
    { capabilities: { logging: {} } },
  );

  registerTools(server, project, assembler);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[annomodels] MCP server running on stdio");

  const shutdown = () => {
    console.error(`[annomodels] Shutting down (${cache.size} model(s) compiled)`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("[annomodels] Error while closing server:", err);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}
