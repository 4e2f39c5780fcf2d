/**
 * DDL rendering: turns compiled table definitions into PostgreSQL/PostGIS
 * CREATE statements for the storage engine. Nothing here executes SQL.
 */

import { createHash } from "node:crypto";
import type { ColumnSpec, ColumnType, DatasetModels, TableDefinition } from "../types/model.ts";
import { InvalidSchemaFieldError, MalformedNameError } from "../errors.ts";

/** Only alphanumeric + underscore, must start with a letter or underscore */
const IDENTIFIER_RE = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** PostgreSQL truncates longer identifiers */
const MAX_IDENTIFIER_LENGTH = 63;

/** PostGIS geometry type names, e.g. POINTZ, POLYGONZ */
const GEOMETRY_RE = /^[A-Z]+$/;

function identifier(name: string): string {
  if (!IDENTIFIER_RE.test(name)) {
    throw new MalformedNameError(name, "not a valid SQL identifier");
  }
  if (name.length > MAX_IDENTIFIER_LENGTH) {
    throw new MalformedNameError(name, `longer than ${MAX_IDENTIFIER_LENGTH} characters`);
  }
  return name;
}

/** `<prefix>_<table>_<column>`, cut to the identifier limit with a hash suffix */
function indexName(prefix: string, table: string, column: string): string {
  const name = `${prefix}_${table}_${column}`;
  if (name.length <= MAX_IDENTIFIER_LENGTH) return name;
  const hash = createHash("sha256").update(name).digest("hex").slice(0, 8);
  return `${name.slice(0, MAX_IDENTIFIER_LENGTH - hash.length - 1)}_${hash}`;
}

function sqlType(column: ColumnSpec): string {
  const type: ColumnType = column.type;
  switch (type.kind) {
    case "numeric":
      return "NUMERIC";
    case "integer":
      return "INTEGER";
    case "float":
      return "FLOAT";
    case "string":
      return "VARCHAR";
    case "boolean":
      return "BOOLEAN";
    case "geometry":
      if (!GEOMETRY_RE.test(type.geometryType)) {
        throw new InvalidSchemaFieldError(
          column.name,
          `invalid geometry type "${type.geometryType}"`,
        );
      }
      return `geometry(${type.geometryType})`;
  }
}

/** Split a "table.column" foreign-key target */
function foreignKeyTarget(target: string): { table: string; column: string } {
  const dot = target.lastIndexOf(".");
  if (dot === -1) {
    throw new MalformedNameError(target, "foreign key target must be table.column");
  }
  return {
    table: identifier(target.slice(0, dot)),
    column: identifier(target.slice(dot + 1)),
  };
}

/** CREATE TABLE plus one CREATE INDEX per indexed column */
export function renderCreateTable(model: TableDefinition): string {
  const table = identifier(model.tableName);
  const body: string[] = [];

  for (const column of model.columns) {
    const notNull = column.primaryKey ? " NOT NULL" : "";
    body.push(`  ${identifier(column.name)} ${sqlType(column)}${notNull}`);
  }

  body.push(`  PRIMARY KEY (${identifier(model.primaryKey.name)})`);

  for (const column of model.columns) {
    if (!column.foreignKey) continue;
    const target = foreignKeyTarget(column.foreignKey);
    body.push(
      `  FOREIGN KEY (${column.name}) REFERENCES ${target.table} (${target.column})`,
    );
  }

  const statements = [`CREATE TABLE ${table} (\n${body.join(",\n")}\n);`];

  for (const column of model.columns) {
    if (!column.indexed || column.primaryKey) continue;
    if (column.type.kind === "geometry") {
      statements.push(
        `CREATE INDEX ${indexName("idx", table, column.name)} ON ${table} USING gist (${column.name});`,
      );
    } else {
      statements.push(
        `CREATE INDEX ${indexName("ix", table, column.name)} ON ${table} (${column.name});`,
      );
    }
  }

  return statements.join("\n");
}

/** DDL for every model of a dataset, in assembly order (root table first) */
export function renderDataset(models: DatasetModels): string {
  return Array.from(models.values()).map(renderCreateTable).join("\n\n");
}
