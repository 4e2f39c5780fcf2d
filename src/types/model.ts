import type { ScalarKind } from "./schema.ts";

export interface ScalarColumnType {
  kind: ScalarKind;
}

/** Opaque 3-D geometry column supplied by the spatial extension */
export interface GeometryColumnType {
  kind: "geometry";
  geometryType: string;
  dimension: 3;
}

export type ColumnType = ScalarColumnType | GeometryColumnType;

/** One emitted column */
export interface ColumnSpec {
  readonly name: string;
  readonly type: ColumnType;
  readonly indexed: boolean;
  /** Target as "table.column" */
  readonly foreignKey?: string;
  readonly primaryKey?: boolean;
  readonly autoincrement?: boolean;
}

/** The compiled, storage-engine-ready description of a table */
export interface TableDefinition {
  /** Canonical name: {dataset}_{table}_v{version} */
  readonly tableName: string;
  readonly modelName: string;
  readonly dataset: string;
  readonly table: string;
  readonly version: number;
  /** Registry schema the table was compiled from; absent on the root table */
  readonly schemaName?: string;
  readonly primaryKey: ColumnSpec;
  /** Primary key first, then flattened fields in declared order */
  readonly columns: readonly ColumnSpec[];
  /** Table does not share a polymorphic identity across datasets */
  readonly concrete: boolean;
  readonly polymorphicIdentity?: string;
}

/** Compiled models of one dataset, keyed by table name */
export type DatasetModels = Map<string, TableDefinition>;
