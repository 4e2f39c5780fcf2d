import type { FieldDescriptor, NestedField, ScalarKind } from "../types/schema.ts";

export const SYNAPSE_SCHEMA_MD = `# synapse

A chemical synapse between two neurons.

## Fields

- **type**: string, drop_column
- **pre_pt**: nested BoundSpatialPoint, required
    - position (integer, postgis POINTZ, required, indexed)
    - supervoxel_id (numeric)
    - root_id (numeric, indexed)
- **ctr_pt**: nested SpatialPoint, required
    - position (integer, postgis POINTZ, required)
- **post_pt**: nested BoundSpatialPoint, required
    - position (integer, postgis POINTZ, required)
    - supervoxel_id (numeric)
    - root_id (numeric, indexed)
- **size**: float
`;

export const BOUTON_SCHEMA_MD = `# presynaptic_bouton_type

Classifies the presynaptic bouton of a synapse.

## Fields

- **type**: string, drop_column
- **target_id**: integer, reference to synapse, indexed
- **bouton_type**: string, required
`;

export const CELL_TYPE_SCHEMA_MD = `# cell_type_local

Cell type anchored at a point.

## Fields

- **type**: string, drop_column
- **cell_type**: string, required, indexed
- **classification_system**: string
- **pt**: nested BoundSpatialPoint, required
    - position (integer, postgis POINTZ, required)
    - supervoxel_id (numeric)
    - root_id (numeric, indexed)
`;

/** Nested record inside a nested record */
export const BROKEN_SCHEMA_MD = `# broken

## Fields

- **outer**: nested
    - inner (nested)
`;

export function scalar(
  name: string,
  kind: ScalarKind,
  extra: { indexed?: boolean; dropColumn?: boolean; postgisGeometry?: string } = {},
): FieldDescriptor {
  return {
    name,
    kind,
    required: false,
    indexed: extra.indexed ?? false,
    dropColumn: extra.dropColumn ?? false,
    ...(extra.postgisGeometry ? { postgisGeometry: extra.postgisGeometry } : {}),
  };
}

export function nested(
  name: string,
  fields: FieldDescriptor[],
  many = false,
): NestedField {
  return {
    name,
    kind: "nested",
    required: false,
    indexed: false,
    dropColumn: false,
    many,
    fields,
  };
}
