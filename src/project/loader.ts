/**
 * Project loader: scans a project folder, reads its configuration and
 * compiles every schema file into a registry.
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { Project } from "../types/project.ts";
import { InMemorySchemaRegistry } from "../registry/schema-registry.ts";
import { CONTACT_SCHEMA } from "../registry/contact.ts";
import { compileSchema } from "../compiler/schema-compiler.ts";
import { loadModelConfig } from "../config/loader.ts";

/** Load a project from a folder path */
export async function loadProject(rootPath: string): Promise<Project> {
  const { name, description } = await loadProjectMeta(rootPath);
  const config = await loadModelConfig(rootPath);
  const registry = await loadSchemaRegistry(rootPath);

  return { rootPath, name, description, config, registry };
}

const UNTITLED = "Untitled Project";

/** Read project.md for name and description */
async function loadProjectMeta(
  rootPath: string,
): Promise<{ name: string; description: string }> {
  try {
    return parseProjectMeta(await readFile(join(rootPath, "project.md"), "utf-8"));
  } catch {
    return { name: UNTITLED, description: "" };
  }
}

/** Name from the H1; description from the text between it and the next heading */
export function parseProjectMeta(content: string): { name: string; description: string } {
  const lines = content.split("\n");
  const headingAt = lines.findIndex((line) => /^#\s+\S/.test(line));
  if (headingAt === -1) return { name: UNTITLED, description: "" };

  const body = lines.slice(headingAt + 1);
  const end = body.findIndex((line) => line.startsWith("##"));
  const description = (end === -1 ? body : body.slice(0, end))
    .map((line) => line.trim())
    .filter(Boolean)
    .join(" ");

  return { name: (lines[headingAt] ?? "").replace(/^#\s+/, "").trim(), description };
}

/**
 * Compile all schema files from schemas/. Files that fail to compile are
 * reported and skipped; the built-in contact schema fills in when the folder
 * does not define one.
 */
export async function loadSchemaRegistry(
  rootPath: string,
): Promise<InMemorySchemaRegistry> {
  const schemaDir = join(rootPath, "schemas");
  const registry = new InMemorySchemaRegistry([CONTACT_SCHEMA]);

  const files = await listMarkdownFiles(schemaDir);
  for (const file of files) {
    const content = await readFile(join(schemaDir, file), "utf-8");
    const relativePath = `schemas/${file}`;

    try {
      registry.register(compileSchema(content, relativePath));
    } catch (err) {
      console.error(`[annomodels] Failed to compile schema ${relativePath}:`, err);
    }
  }

  return registry;
}

/** List .md files in a directory (non-recursive, excluding _-prefixed files) */
async function listMarkdownFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await readdir(dirPath);
    return entries
      .filter((f) => f.endsWith(".md") && !f.startsWith("_"))
      .sort();
  } catch {
    return []; // No schemas folder
  }
}
