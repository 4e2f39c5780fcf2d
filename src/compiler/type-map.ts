import { SCALAR_KINDS, type ScalarKind } from "../types/schema.ts";
import type { ColumnType, GeometryColumnType } from "../types/model.ts";

/** Scalar field kind → column type */
export const FIELD_COLUMN_MAP: Readonly<Record<ScalarKind, ColumnType>> = {
  numeric: { kind: "numeric" },
  integer: { kind: "integer" },
  float: { kind: "float" },
  string: { kind: "string" },
  boolean: { kind: "boolean" },
};

export function isScalarKind(kind: string): kind is ScalarKind {
  return SCALAR_KINDS.some((k) => k === kind);
}

export function columnTypeFor(kind: ScalarKind): ColumnType {
  return FIELD_COLUMN_MAP[kind];
}

export function geometryType(tag: string): GeometryColumnType {
  return { kind: "geometry", geometryType: tag, dimension: 3 };
}
