import type { AnnotationSchema, FieldDescriptor, NestedField } from "../types/schema.ts";

function scalar(
  name: string,
  kind: "numeric" | "integer",
  extra: Partial<Pick<FieldDescriptor, "indexed" | "postgisGeometry" | "required">> = {},
): FieldDescriptor {
  return {
    name,
    kind,
    required: extra.required ?? false,
    indexed: extra.indexed ?? false,
    dropColumn: false,
    ...(extra.postgisGeometry ? { postgisGeometry: extra.postgisGeometry } : {}),
  };
}

/** A 3-D point, optionally bound to a supervoxel and its root entity */
function point(name: string, bound: boolean): NestedField {
  const fields = [scalar("position", "integer", { postgisGeometry: "POINTZ", required: true })];
  if (bound) {
    fields.push(scalar("supervoxel_id", "numeric"), scalar("root_id", "numeric", { indexed: true }));
  }
  return {
    name,
    kind: "nested",
    many: false,
    required: true,
    indexed: false,
    dropColumn: false,
    fields,
    schemaName: bound ? "BoundSpatialPoint" : "SpatialPoint",
  };
}

/** Built-in schema describing adjacency between two root entities */
export const CONTACT_SCHEMA: AnnotationSchema = {
  name: "contact",
  description: "A contact between two segmented objects.",
  category: "annotation",
  fields: [
    {
      name: "type",
      kind: "string",
      required: true,
      indexed: false,
      dropColumn: true,
    },
    point("sidea_pt", true),
    point("sideb_pt", true),
    point("ctr_pt", false),
    scalar("size", "integer", { required: true }),
  ],
};
