/**
 * Model compiler: compiles an annotation schema into a table definition for
 * one dataset and version. Fully rule-based: the schema's field order drives
 * the column order, with the primary key first.
 */

import type { AnnotationSchema } from "../types/schema.ts";
import type { ColumnSpec, TableDefinition } from "../types/model.ts";
import { DEFAULT_COMPILER_OPTIONS, type CompilerOptions } from "../types/config.ts";
import { InvalidSchemaFieldError } from "../errors.ts";
import { flattenField, type FlattenContext } from "./field-flattener.ts";
import { formatTableName, modelName } from "./naming.ts";
import { columnTypeFor } from "./type-map.ts";

const TARGET_ID = "target_id";

/** Primary key: ids are assigned externally, never autoincremented */
function primaryKeyColumn(): ColumnSpec {
  return {
    name: "id",
    type: columnTypeFor("numeric"),
    indexed: false,
    primaryKey: true,
    autoincrement: false,
  };
}

/** Compile an annotation schema into an (uncached) table definition */
export function declareAnnotationModel(
  dataset: string,
  tableName: string,
  schema: AnnotationSchema,
  version: number,
  options: CompilerOptions = DEFAULT_COMPILER_OPTIONS,
): TableDefinition {
  const canonical = formatTableName(dataset, tableName, version);
  const ctx: FlattenContext = { dataset, version, rootTable: options.rootTable };

  const primaryKey = primaryKeyColumn();
  const columns: ColumnSpec[] = [primaryKey];

  for (const field of schema.fields) {
    if (field.dropColumn) continue;
    for (const column of flattenField(field.name, field, ctx)) {
      if (columns.some((c) => c.name === column.name)) {
        throw new InvalidSchemaFieldError(
          column.name,
          `duplicate column in table "${canonical}"`,
        );
      }
      columns.push(column);
    }
  }

  if (schema.category === "reference") {
    addReferenceColumn(columns, dataset, schema);
  }

  return freezeDefinition({
    tableName: canonical,
    modelName: modelName(dataset, tableName),
    dataset,
    table: tableName,
    version,
    schemaName: schema.name,
    primaryKey,
    columns,
    concrete: true,
    polymorphicIdentity: dataset,
  });
}

/** The per-dataset root entity table: an id and nothing else */
export function declareRootModel(
  dataset: string,
  version: number,
  options: CompilerOptions = DEFAULT_COMPILER_OPTIONS,
): TableDefinition {
  const primaryKey = primaryKeyColumn();
  return freezeDefinition({
    tableName: formatTableName(dataset, options.rootTable, version),
    modelName: modelName(dataset, "") + options.rootModel,
    dataset,
    table: options.rootTable,
    version,
    primaryKey,
    columns: [primaryKey],
    concrete: false,
  });
}

/**
 * Wire target_id to the referenced entity table. A plain target_id column
 * produced by flattening is replaced in place by the foreign-key column.
 */
function addReferenceColumn(
  columns: ColumnSpec[],
  dataset: string,
  schema: AnnotationSchema,
): void {
  const target = schema.fields.find((f) => f.name === TARGET_ID);
  if (!target || target.kind !== "reference") {
    throw new InvalidSchemaFieldError(
      TARGET_ID,
      `reference schema "${schema.name}" must declare a reference field`,
    );
  }

  const existing = columns.findIndex((c) => c.name === TARGET_ID);
  const column: ColumnSpec = {
    name: TARGET_ID,
    type: columnTypeFor("integer"),
    indexed: existing === -1 ? false : (columns[existing]?.indexed ?? false),
    foreignKey: `${dataset}_${target.referenceType}.id`,
  };

  if (existing === -1) {
    columns.push(column);
  } else {
    columns[existing] = column;
  }
}

function freezeDefinition(definition: TableDefinition): TableDefinition {
  for (const column of definition.columns) {
    Object.freeze(column.type);
    Object.freeze(column);
  }
  Object.freeze(definition.columns);
  return Object.freeze(definition);
}
