/** Scalar field kinds with a direct column mapping */
export const SCALAR_KINDS = [
  "numeric",
  "integer",
  "float",
  "string",
  "boolean",
] as const;

export type ScalarKind = (typeof SCALAR_KINDS)[number];

/** Field kinds recognized by the model compiler */
export const FIELD_KINDS = [...SCALAR_KINDS, "nested", "reference"] as const;

export type FieldKind = (typeof FIELD_KINDS)[number];

/** Schema categories that change how a table is compiled */
export const SCHEMA_CATEGORIES = ["annotation", "reference"] as const;
export type SchemaCategory = (typeof SCHEMA_CATEGORIES)[number];

interface FieldBase {
  name: string;
  required: boolean;
  indexed: boolean;
  /** Field is part of the schema but never stored */
  dropColumn: boolean;
  /** Geometry tag (e.g. "POINTZ"); overrides the kind's column type */
  postgisGeometry?: string;
  description?: string;
}

export interface ScalarField extends FieldBase {
  kind: ScalarKind;
}

export interface ReferenceField extends FieldBase {
  kind: "reference";
  /** Entity type the referenced id belongs to (e.g. "synapse") */
  referenceType: string;
}

export interface NestedField extends FieldBase {
  kind: "nested";
  /** One field expanding to several rows; rejected by the compiler */
  many: boolean;
  fields: FieldDescriptor[];
  /** Name of the nested record type, e.g. "BoundSpatialPoint" */
  schemaName?: string;
}

export type FieldDescriptor = ScalarField | ReferenceField | NestedField;

/** A named, ordered set of field descriptors describing one annotation type */
export interface AnnotationSchema {
  name: string;
  description: string;
  category: SchemaCategory;
  fields: FieldDescriptor[];
  /** Path to the source markdown file (relative to project root) */
  sourcePath?: string;
}
