#!/usr/bin/env tsx
/**
 * annomodels CLI: entry point for the command-line interface.
 *
 * Commands:
 *   annomodels <project-path>                       Start the MCP server
 *   annomodels schemas [<project-path>]             List registered schemas
 *   annomodels compile <project-path> <dataset> <schema:table>...
 *   annomodels next-version <dataset> <table>...    Next free version
 *   annomodels version                              Print version
 */

import { resolve } from "node:path";
import { loadProject } from "./project/loader.ts";
import { compilerOptionsFrom } from "./types/config.ts";
import { ModelCache } from "./cache/model-cache.ts";
import { DatasetAssembler, type SchemaTablePair } from "./assembler/dataset-assembler.ts";
import { nextVersion } from "./compiler/naming.ts";
import { renderDataset } from "./ddl/render.ts";
import { startServer } from "./server/mcp.ts";
import { VERSION } from "./version.ts";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    printUsage();
    process.exit(0);
  }

  if (command === "version" || command === "--version" || command === "-v") {
    console.log(`annomodels v${VERSION}`);
    process.exit(0);
  }

  if (command === "schemas") {
    await listSchemas(resolve(args[1] ?? "."));
    process.exit(0);
  }

  if (command === "compile") {
    await compile(args.slice(1));
    process.exit(0);
  }

  if (command === "next-version") {
    const [dataset, ...tables] = args.slice(1);
    if (!dataset) {
      console.error("Usage: annomodels next-version <dataset> <table>...");
      process.exit(1);
    }
    console.log(nextVersion(tables, dataset));
    process.exit(0);
  }

  // Default: serve the project over MCP
  await startServer(resolve(command));
}

async function listSchemas(projectPath: string): Promise<void> {
  const project = await loadProject(projectPath);
  for (const schema of project.registry.list()) {
    console.log(`${schema.name}\t${schema.category}\t${schema.fields.length} field(s)`);
  }
}

/** compile <project> <dataset> <schema:table>... [--version N] [--contacts] [--ddl] */
async function compile(args: string[]): Promise<void> {
  const positional: string[] = [];
  let version: number | undefined;
  let contacts: boolean | undefined;
  let ddl = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "--version") {
      version = parseVersion(args[++i]);
    } else if (arg === "--contacts") {
      contacts = true;
    } else if (arg === "--ddl") {
      ddl = true;
    } else {
      positional.push(arg);
    }
  }

  const [projectArg, dataset, ...pairArgs] = positional;
  if (!projectArg || !dataset) {
    console.error(
      "Usage: annomodels compile <project-path> <dataset> <schema:table>... [--version N] [--contacts] [--ddl]",
    );
    process.exit(1);
  }

  const project = await loadProject(resolve(projectArg));
  const assembler = new DatasetAssembler(
    project.registry,
    new ModelCache(),
    compilerOptionsFrom(project.config),
  );

  const models = assembler.assembleDataset(
    dataset,
    pairArgs.map(parsePair),
    version ?? project.config.defaultVersion,
    contacts ?? project.config.includeContacts,
  );

  if (ddl) {
    console.log(renderDataset(models));
  } else {
    console.log(JSON.stringify(Object.fromEntries(models), null, 2));
  }
}

/** "synapse:synapse_table" → ["synapse", "synapse_table"]; a bare name is used for both */
function parsePair(arg: string): SchemaTablePair {
  const sep = arg.indexOf(":");
  if (sep === -1) return [arg, arg];
  return [arg.slice(0, sep), arg.slice(sep + 1)];
}

function parseVersion(value: string | undefined): number {
  if (!value || !/^(0|[1-9]\d*)$/.test(value)) {
    console.error(`Error: --version expects a non-negative integer, got "${value ?? ""}"`);
    process.exit(1);
  }
  return Number(value);
}

function printUsage(): void {
  console.log(`
annomodels v${VERSION}: annotation schema to table definition compiler

Usage:
  annomodels <project-path>                   Start the MCP server
  annomodels schemas [<project-path>]         List registered schemas
  annomodels compile <project-path> <dataset> <schema:table>... [options]
      --version N    Table version (default from config/models.md)
      --contacts     Include the contact table
      --ddl          Print CREATE statements instead of JSON
  annomodels next-version <dataset> <table>...
  annomodels version                          Print version

Examples:
  annomodels compile ./schemas-project pinky synapse:synapse_table --version 1
  annomodels next-version pinky pinky_synapse_v0 pinky_synapse_v1
  `.trim());
}

main().catch((err: unknown) => {
  console.error("[annomodels] Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
