/**
 * MCP tools: expose schema listing, dataset compilation and version
 * discovery. Handlers are plain functions so they can be exercised without a
 * transport.
 */

import { z } from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { Project } from "../types/project.ts";
import type { DatasetAssembler } from "../assembler/dataset-assembler.ts";
import { nextVersion } from "../compiler/naming.ts";
import { renderDataset } from "../ddl/render.ts";

export interface CompileDatasetArgs {
  dataset: string;
  tables: { schema: string; table: string }[];
  version?: number;
  include_contacts?: boolean;
  ddl?: boolean;
}

export interface NextVersionArgs {
  dataset: string;
  existing_tables: string[];
}

/** Register all tools on the MCP server */
export function registerTools(
  server: McpServer,
  project: Project,
  assembler: DatasetAssembler,
): void {
  server.registerTool("list_schemas", {
    title: "List Schemas",
    description: "Returns every registered annotation schema with its fields.",
  }, async (): Promise<CallToolResult> => handleListSchemas(project));

  server.registerTool("compile_dataset", {
    title: "Compile Dataset",
    description:
      "Compile table definitions for a dataset: the root table, one table per (schema, table) pair, and optionally the contact table.",
    inputSchema: z.object({
      dataset: z.string().describe("Dataset name, e.g. 'pinky'"),
      tables: z.array(z.object({
        schema: z.string().describe("Registered schema name"),
        table: z.string().describe("Table name within the dataset"),
      })),
      version: z.number().int().nonnegative().optional(),
      include_contacts: z.boolean().optional(),
      ddl: z.boolean().optional().describe("Also render CREATE statements"),
    }),
  }, async (args: CompileDatasetArgs): Promise<CallToolResult> =>
    handleCompileDataset(project, assembler, args));

  server.registerTool("next_version", {
    title: "Next Version",
    description:
      "Given the table names that exist in a database, return the next free version for a dataset.",
    inputSchema: z.object({
      dataset: z.string(),
      existing_tables: z.array(z.string()),
    }),
  }, async (args: NextVersionArgs): Promise<CallToolResult> => handleNextVersion(args));
}

export function handleListSchemas(project: Project): CallToolResult {
  const schemas = project.registry.list().map((s) => ({
    name: s.name,
    description: s.description,
    category: s.category,
    fields: s.fields.map((f) => ({
      name: f.name,
      kind: f.kind,
      ...(f.indexed && { indexed: true }),
      ...(f.dropColumn && { dropColumn: true }),
      ...(f.kind === "reference" && { referenceType: f.referenceType }),
      ...(f.kind === "nested" && { fields: f.fields.map((sub) => sub.name) }),
    })),
  }));

  return ok({ project: project.name, schemas });
}

export function handleCompileDataset(
  project: Project,
  assembler: DatasetAssembler,
  args: CompileDatasetArgs,
): CallToolResult {
  const version = args.version ?? project.config.defaultVersion;
  const includeContacts = args.include_contacts ?? project.config.includeContacts;

  try {
    const models = assembler.assembleDataset(
      args.dataset,
      args.tables.map((t) => [t.schema, t.table] as const),
      version,
      includeContacts,
    );
    return ok({
      dataset: args.dataset,
      version,
      models: Object.fromEntries(models),
      ...(args.ddl && { ddl: renderDataset(models) }),
    });
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }
}

export function handleNextVersion(args: NextVersionArgs): CallToolResult {
  try {
    return ok({
      dataset: args.dataset,
      next_version: nextVersion(args.existing_tables, args.dataset),
    });
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }
}

// --- Helpers ---

function ok(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

function err(message: string): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: { code: "error", message } }) }],
    isError: true,
  };
}
