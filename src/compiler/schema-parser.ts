/**
 * Schema markdown parser: extracts structured sections from a schema .md file.
 * This module handles raw text parsing; field interpretation is in field-parser.ts.
 */

import { SchemaParseError } from "../errors.ts";

export interface RawSchema {
  schemaName: string;
  description: string;
  rawFields: RawField[];
}

export interface RawField {
  name: string;
  /** Everything after the field name (kind, modifiers) */
  definition: string;
  /** Indented sub-items (fields of a nested record) */
  subItems: RawField[];
}

/** Parse a schema markdown file into raw sections */
export function parseSchemaMarkdown(content: string, sourcePath: string): RawSchema {
  const lines = content.split("\n");
  const schemaName = extractSchemaName(lines, sourcePath);
  const sections = splitSections(lines);

  return {
    schemaName,
    description: sections.description,
    rawFields: parseFieldLines(sections.fieldsLines),
  };
}

/** Extract the schema name from the first H1 heading */
function extractSchemaName(lines: string[], sourcePath: string): string {
  for (const line of lines) {
    const match = line.match(/^#\s+(.+)$/);
    if (match?.[1]) return match[1].trim();
  }
  throw new SchemaParseError(
    sourcePath,
    "schema file must have an H1 heading with the schema name",
  );
}

interface SchemaSections {
  description: string;
  fieldsLines: string[];
}

/** Split the markdown into description and fields sections */
function splitSections(lines: string[]): SchemaSections {
  let currentSection: "pre" | "description" | "fields" | "other" = "pre";
  const descriptionLines: string[] = [];
  const fieldsLines: string[] = [];

  for (const line of lines) {
    if (line.match(/^#\s+/)) {
      currentSection = "description";
      continue;
    }

    const h2Match = line.match(/^##\s+(.+)$/);
    if (h2Match?.[1]) {
      const heading = h2Match[1].trim().toLowerCase();
      currentSection = heading === "fields" ? "fields" : "other";
      continue;
    }

    switch (currentSection) {
      case "description":
        descriptionLines.push(line);
        break;
      case "fields":
        fieldsLines.push(line);
        break;
    }
  }

  return {
    description: descriptionLines.join("\n").trim(),
    fieldsLines,
  };
}

const FIELD_LINE_PATTERN = /^(\s*)-\s+\*\*(\w+)\*\*:\s*(.+)$/;
const SUB_ITEM_PATTERN = /^(\s+)-\s+(\w+)\s*\((.+)\)\s*$/;

interface FieldLine {
  indent: number;
  /** Written as `- **name**: definition` */
  bold: boolean;
  field: RawField;
}

function matchFieldLine(line: string): FieldLine | undefined {
  const bold = line.match(FIELD_LINE_PATTERN);
  const match = bold ?? line.match(SUB_ITEM_PATTERN);
  if (!match) return undefined;
  return {
    indent: match[1]?.length ?? 0,
    bold: bold !== null,
    field: { name: match[2] ?? "", definition: (match[3] ?? "").trim(), subItems: [] },
  };
}

/**
 * Group field list items. A plain `- name (definition)` item, or a bold item
 * indented deeper than the top-level fields, belongs to the field above it.
 */
function parseFieldLines(lines: string[]): RawField[] {
  const fields: RawField[] = [];
  let baseIndent = 0;

  for (const line of lines) {
    const item = matchFieldLine(line);
    if (!item) continue;

    const parent = fields[fields.length - 1];
    if (parent && (!item.bold || item.indent > baseIndent)) {
      parent.subItems.push(item.field);
    } else if (item.bold) {
      baseIndent = item.indent;
      fields.push(item.field);
    }
  }

  return fields;
}
