import { describe, expect, test } from "vitest";
import { flattenField, type FlattenContext } from "../field-flattener.ts";
import { InvalidSchemaFieldError, UnsupportedFieldTypeError } from "../../errors.ts";
import { nested, scalar } from "../../__tests__/fixtures.ts";

const ctx: FlattenContext = { dataset: "pinky", version: 1, rootTable: "cellsegment" };

const boundPoint = () =>
  nested("pre_pt", [
    scalar("position", "integer", { postgisGeometry: "POINTZ" }),
    scalar("supervoxel_id", "numeric"),
    scalar("root_id", "numeric", { indexed: true }),
  ]);

describe("flattenField", () => {
  test("maps a scalar field to one column", () => {
    expect(flattenField("size", scalar("size", "float", { indexed: true }), ctx)).toEqual([
      { name: "size", type: { kind: "float" }, indexed: true },
    ]);
  });

  test("maps every scalar kind", () => {
    const kinds = ["numeric", "integer", "float", "string", "boolean"] as const;
    for (const kind of kinds) {
      expect(flattenField("f", scalar("f", kind), ctx)).toEqual([
        { name: "f", type: { kind }, indexed: false },
      ]);
    }
  });

  test("dropped fields produce no columns", () => {
    expect(flattenField("type", scalar("type", "string", { dropColumn: true }), ctx)).toEqual([]);
  });

  test("reference fields store an integer id", () => {
    const field = {
      name: "target_id",
      kind: "reference" as const,
      referenceType: "synapse",
      required: true,
      indexed: true,
      dropColumn: false,
    };
    expect(flattenField("target_id", field, ctx)).toEqual([
      { name: "target_id", type: { kind: "integer" }, indexed: true },
    ]);
  });

  test("expands a nested point into prefixed columns", () => {
    expect(flattenField("pre_pt", boundPoint(), ctx)).toEqual([
      {
        name: "pre_pt_position",
        type: { kind: "geometry", geometryType: "POINTZ", dimension: 3 },
        indexed: true,
      },
      { name: "pre_pt_supervoxel_id", type: { kind: "numeric" }, indexed: false },
      {
        name: "pre_pt_root_id",
        type: { kind: "numeric" },
        indexed: true,
        foreignKey: "pinky_cellsegment_v1.id",
      },
    ]);
  });

  test("geometry tag wins over the declared scalar kind", () => {
    const field = nested("region", [scalar("outline", "string", { postgisGeometry: "POLYGONZ" })]);
    expect(flattenField("region", field, ctx)).toEqual([
      {
        name: "region_outline",
        type: { kind: "geometry", geometryType: "POLYGONZ", dimension: 3 },
        indexed: true,
      },
    ]);
  });

  test("root_id targets the configured root table at the same version", () => {
    const field = nested("pt", [scalar("root_id", "numeric")]);
    const columns = flattenField("pt", field, { dataset: "basil", version: 7, rootTable: "neuron" });
    expect(columns).toEqual([
      {
        name: "pt_root_id",
        type: { kind: "numeric" },
        indexed: false,
        foreignKey: "basil_neuron_v7.id",
      },
    ]);
  });

  test("skips dropped sub-fields", () => {
    const field = nested("pt", [
      scalar("position", "integer", { postgisGeometry: "POINTZ" }),
      scalar("note", "string", { dropColumn: true }),
    ]);
    expect(flattenField("pt", field, ctx).map((c) => c.name)).toEqual(["pt_position"]);
  });

  test("rejects nested fields with many values", () => {
    expect(() => flattenField("pts", nested("pts", [], true), ctx)).toThrow(
      InvalidSchemaFieldError,
    );
  });

  test("rejects a nested record inside a nested record", () => {
    const field = nested("outer", [
      scalar("a", "integer"),
      nested("inner", [scalar("b", "integer")]),
    ]);
    expect(() => flattenField("outer", field, ctx)).toThrow(
      'Field "outer_inner": nested records inside nested records are not supported',
    );
  });

  test("rejects kinds outside the closed set", () => {
    const untyped = JSON.parse(
      '{"name":"tags","kind":"list","required":false,"indexed":false,"dropColumn":false}',
    );
    expect(() => flattenField("tags", untyped, ctx)).toThrow(UnsupportedFieldTypeError);
    expect(() => flattenField("tags", untyped, ctx)).toThrow(
      'Field "tags": type "list" not supported',
    );
  });

  test("rejects unknown sub-field kinds", () => {
    const untyped = JSON.parse(
      '{"name":"pt","kind":"nested","many":false,"required":false,"indexed":false,"dropColumn":false,' +
      '"fields":[{"name":"when","kind":"date","required":false,"indexed":false,"dropColumn":false}]}',
    );
    expect(() => flattenField("pt", untyped, ctx)).toThrow(
      'Field "pt_when": type "date" not supported',
    );
  });
});
