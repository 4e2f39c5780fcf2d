/**
 * Field flattener: turns one field descriptor into the fixed-width set of
 * columns that store it. Nested records expand one level deep into
 * `<field>_<sub>` columns; `root_id` sub-fields bind the row to the dataset's
 * root entity table.
 */

import type { FieldDescriptor, NestedField } from "../types/schema.ts";
import type { ColumnSpec } from "../types/model.ts";
import { InvalidSchemaFieldError, UnsupportedFieldTypeError } from "../errors.ts";
import { formatTableName } from "./naming.ts";
import { columnTypeFor, geometryType } from "./type-map.ts";

export interface FlattenContext {
  dataset: string;
  version: number;
  /** Logical name of the root entity table, e.g. "cellsegment" */
  rootTable: string;
}

const ROOT_ID = "root_id";

/** Flatten a field into its columns; dropped fields yield none */
export function flattenField(
  fieldName: string,
  field: FieldDescriptor,
  ctx: FlattenContext,
): ColumnSpec[] {
  if (field.dropColumn) return [];

  switch (field.kind) {
    case "numeric":
    case "integer":
    case "float":
    case "string":
    case "boolean":
      return [{ name: fieldName, type: columnTypeFor(field.kind), indexed: field.indexed }];

    case "reference":
      return [{ name: fieldName, type: columnTypeFor("integer"), indexed: field.indexed }];

    case "nested":
      return flattenNested(fieldName, field, ctx);

    default:
      throw unsupported(fieldName, field);
  }
}

function flattenNested(
  fieldName: string,
  field: NestedField,
  ctx: FlattenContext,
): ColumnSpec[] {
  if (field.many) {
    throw new InvalidSchemaFieldError(
      fieldName,
      "nested fields with many values are not supported",
    );
  }

  const columns: ColumnSpec[] = [];
  for (const sub of field.fields) {
    if (sub.dropColumn) continue;
    columns.push(flattenSubField(`${fieldName}_${sub.name}`, sub, ctx));
  }
  return columns;
}

function flattenSubField(
  columnName: string,
  sub: FieldDescriptor,
  ctx: FlattenContext,
): ColumnSpec {
  if (sub.kind === "nested") {
    throw new InvalidSchemaFieldError(
      columnName,
      "nested records inside nested records are not supported",
    );
  }

  // Geometry wins over the declared scalar kind; spatial columns always get an index
  if (sub.postgisGeometry) {
    return { name: columnName, type: geometryType(sub.postgisGeometry), indexed: true };
  }

  const foreignKey = sub.name === ROOT_ID
    ? `${formatTableName(ctx.dataset, ctx.rootTable, ctx.version)}.id`
    : undefined;

  switch (sub.kind) {
    case "numeric":
    case "integer":
    case "float":
    case "string":
    case "boolean":
      return withForeignKey(
        { name: columnName, type: columnTypeFor(sub.kind), indexed: sub.indexed },
        foreignKey,
      );

    case "reference":
      return withForeignKey(
        { name: columnName, type: columnTypeFor("integer"), indexed: sub.indexed },
        foreignKey,
      );

    default:
      throw unsupported(columnName, sub);
  }
}

function withForeignKey(column: ColumnSpec, foreignKey: string | undefined): ColumnSpec {
  return foreignKey ? { ...column, foreignKey } : column;
}

/** Kinds outside the closed set only arrive from untyped input */
function unsupported(fieldName: string, field: never): UnsupportedFieldTypeError {
  const untyped: { kind?: unknown } = field;
  return new UnsupportedFieldTypeError(fieldName, String(untyped.kind));
}
