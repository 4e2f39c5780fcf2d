/**
 * Field definition parser: interprets the keywords of a raw field definition
 * string ("nested BoundSpatialPoint, required", "integer, postgis POINTZ")
 * into a FieldDescriptor. The first word is always the kind.
 */

import { FIELD_KINDS, type FieldDescriptor, type FieldKind } from "../types/schema.ts";
import { InvalidSchemaFieldError, UnsupportedFieldTypeError } from "../errors.ts";
import type { RawField } from "./schema-parser.ts";

const MODIFIERS = new Set([
  "required",
  "optional",
  "indexed",
  "drop_column",
  "many",
  "postgis",
  "reference",
  "to",
]);

/** Parse a raw field into a FieldDescriptor */
export function parseField(raw: RawField): FieldDescriptor {
  const tokens = tokenize(raw.definition);
  const kind = extractKind(raw.name, tokens);

  const base = {
    name: raw.name,
    required: hasKeyword(tokens, "required"),
    indexed: hasKeyword(tokens, "indexed"),
    dropColumn: hasKeyword(tokens, "drop_column"),
  };

  const geometry = extractGeometry(raw.name, tokens);
  const common = geometry ? { ...base, postgisGeometry: geometry } : base;

  if (kind !== "nested" && raw.subItems.length > 0) {
    throw new InvalidSchemaFieldError(raw.name, "only nested fields can have sub-fields");
  }

  // "reference to <type>" turns any numeric kind into a reference
  const referenceType = extractReference(tokens);
  if (kind === "reference" || referenceType) {
    if (!referenceType) {
      throw new InvalidSchemaFieldError(raw.name, 'reference fields need "reference to <type>"');
    }
    return { ...common, kind: "reference", referenceType };
  }

  if (kind === "nested") {
    const second = tokens[1];
    const schemaName = second && !MODIFIERS.has(second.toLowerCase())
      ? second
      : undefined;
    return {
      ...common,
      kind,
      many: hasKeyword(tokens, "many"),
      fields: raw.subItems.map(parseField),
      ...(schemaName ? { schemaName } : {}),
    };
  }

  return { ...common, kind };
}

/** Split a definition on whitespace and commas */
function tokenize(definition: string): string[] {
  return definition.split(/[\s,]+/).filter(Boolean);
}

/** Check if any token matches a keyword (case-insensitive) */
function hasKeyword(tokens: string[], keyword: string): boolean {
  return tokens.some((t) => t.toLowerCase() === keyword);
}

function extractKind(fieldName: string, tokens: string[]): FieldKind {
  const first = tokens[0] ?? "";
  const lower = first.toLowerCase();
  const kind = FIELD_KINDS.find((k) => k === lower);
  if (!kind) throw new UnsupportedFieldTypeError(fieldName, first);
  return kind;
}

/** PostGIS geometry type names, e.g. POINTZ, POLYGONZ */
const GEOMETRY_TAG = /^[A-Z]+$/;

/** "postgis POINTZ" -> "POINTZ"; the keyword without a tag is an error */
function extractGeometry(fieldName: string, tokens: string[]): string | undefined {
  if (!hasKeyword(tokens, "postgis")) return undefined;
  const tag = extractFollowing(tokens, "postgis");
  if (!tag || !GEOMETRY_TAG.test(tag)) {
    throw new InvalidSchemaFieldError(fieldName, '"postgis" needs a geometry type such as POINTZ');
  }
  return tag;
}

/** The token following a keyword, e.g. "postgis POINTZ" -> "POINTZ" */
function extractFollowing(tokens: string[], keyword: string): string | undefined {
  const idx = tokens.findIndex((t) => t.toLowerCase() === keyword);
  if (idx === -1) return undefined;
  return tokens[idx + 1];
}

/** Extract reference target (e.g. "reference to synapse") */
function extractReference(tokens: string[]): string | undefined {
  const refIdx = tokens.findIndex((t) => t.toLowerCase() === "reference");
  if (refIdx === -1) return undefined;

  const toToken = tokens[refIdx + 1];
  const typeToken = tokens[refIdx + 2];

  if (toToken?.toLowerCase() === "to" && typeToken) {
    return typeToken;
  }

  return undefined;
}
