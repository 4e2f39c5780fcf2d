/**
 * Schema compiler: compiles a schema markdown file into an AnnotationSchema
 * ready for the registry.
 */

import type { AnnotationSchema } from "../types/schema.ts";
import { SchemaParseError } from "../errors.ts";
import { parseSchemaMarkdown } from "./schema-parser.ts";
import { parseField } from "./field-parser.ts";

/** Compile a schema markdown string into an AnnotationSchema */
export function compileSchema(
  content: string,
  sourcePath: string,
): AnnotationSchema {
  const raw = parseSchemaMarkdown(content, sourcePath);
  const fields = raw.rawFields.map(parseField);

  const seen = new Set<string>();
  for (const field of fields) {
    if (seen.has(field.name)) {
      throw new SchemaParseError(sourcePath, `field "${field.name}" is declared twice`);
    }
    seen.add(field.name);
  }

  // A referenced target_id makes this a reference annotation
  const isReference = fields.some(
    (f) => f.name === "target_id" && f.kind === "reference",
  );

  return {
    name: raw.schemaName,
    description: raw.description,
    category: isReference ? "reference" : "annotation",
    fields,
    sourcePath,
  };
}
