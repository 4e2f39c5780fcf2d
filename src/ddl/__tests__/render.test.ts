import { describe, expect, test } from "vitest";
import { renderCreateTable, renderDataset } from "../render.ts";
import { declareAnnotationModel, declareRootModel } from "../../compiler/model-compiler.ts";
import { compileSchema } from "../../compiler/schema-compiler.ts";
import { MalformedNameError } from "../../errors.ts";
import type { DatasetModels } from "../../types/model.ts";
import type { AnnotationSchema } from "../../types/schema.ts";
import { BOUTON_SCHEMA_MD, CELL_TYPE_SCHEMA_MD, scalar } from "../../__tests__/fixtures.ts";

const bouton = compileSchema(BOUTON_SCHEMA_MD, "schemas/presynaptic_bouton_type.md");
const cellType = compileSchema(CELL_TYPE_SCHEMA_MD, "schemas/cell_type_local.md");

describe("renderCreateTable", () => {
  test("renders the root table", () => {
    expect(renderCreateTable(declareRootModel("pinky", 1))).toBe(
      [
        "CREATE TABLE pinky_cellsegment_v1 (",
        "  id NUMERIC NOT NULL,",
        "  PRIMARY KEY (id)",
        ");",
      ].join("\n"),
    );
  });

  test("renders foreign keys and b-tree indexes", () => {
    const model = declareAnnotationModel("pinky", "bouton", bouton, 1);
    expect(renderCreateTable(model)).toBe(
      [
        "CREATE TABLE pinky_bouton_v1 (",
        "  id NUMERIC NOT NULL,",
        "  target_id INTEGER,",
        "  bouton_type VARCHAR,",
        "  PRIMARY KEY (id),",
        "  FOREIGN KEY (target_id) REFERENCES pinky_synapse (id)",
        ");",
        "CREATE INDEX ix_pinky_bouton_v1_target_id ON pinky_bouton_v1 (target_id);",
      ].join("\n"),
    );
  });

  test("renders geometry columns with spatial indexes", () => {
    const model = declareAnnotationModel("pinky", "cells", cellType, 2);
    expect(renderCreateTable(model).split("\n")).toEqual([
      "CREATE TABLE pinky_cells_v2 (",
      "  id NUMERIC NOT NULL,",
      "  cell_type VARCHAR,",
      "  classification_system VARCHAR,",
      "  pt_position geometry(POINTZ),",
      "  pt_supervoxel_id NUMERIC,",
      "  pt_root_id NUMERIC,",
      "  PRIMARY KEY (id),",
      "  FOREIGN KEY (pt_root_id) REFERENCES pinky_cellsegment_v2 (id)",
      ");",
      "CREATE INDEX ix_pinky_cells_v2_cell_type ON pinky_cells_v2 (cell_type);",
      "CREATE INDEX idx_pinky_cells_v2_pt_position ON pinky_cells_v2 USING gist (pt_position);",
      "CREATE INDEX ix_pinky_cells_v2_pt_root_id ON pinky_cells_v2 (pt_root_id);",
    ]);
  });

  test("rejects names that are not SQL identifiers", () => {
    expect(() => renderCreateTable(declareRootModel("my-data", 1))).toThrow(MalformedNameError);
  });
});

describe("renderCreateTable identifier limits", () => {
  const widths: AnnotationSchema = {
    name: "cleft_widths",
    description: "",
    category: "annotation",
    fields: [
      scalar("presynaptic_cleft_width_a", "float", { indexed: true }),
      scalar("presynaptic_cleft_width_b", "float", { indexed: true }),
    ],
  };

  function indexNames(ddl: string): string[] {
    return ddl.split("\n")
      .filter((line) => line.startsWith("CREATE INDEX "))
      .map((line) => line.split(" ")[2] ?? "");
  }

  test("shortens long index names to distinct 63-character names", () => {
    const table = "a".repeat(40);
    const model = declareAnnotationModel("pinky", table, widths, 1);
    const names = indexNames(renderCreateTable(model));

    expect(names).toHaveLength(2);
    for (const name of names) {
      expect(name).toHaveLength(63);
      expect(name.startsWith(`ix_pinky_${table}_v1_p`)).toBe(true);
      expect(name).toMatch(/_[0-9a-f]{8}$/);
    }
    expect(names[0]).not.toBe(names[1]);
    expect(indexNames(renderCreateTable(model))).toEqual(names);
  });

  test("keeps short index names unchanged", () => {
    const model = declareAnnotationModel("pinky", "w", widths, 1);
    expect(indexNames(renderCreateTable(model))).toEqual([
      "ix_pinky_w_v1_presynaptic_cleft_width_a",
      "ix_pinky_w_v1_presynaptic_cleft_width_b",
    ]);
  });

  test("rejects table names over 63 characters", () => {
    const model = declareAnnotationModel("pinky", "b".repeat(60), widths, 1);
    expect(() => renderCreateTable(model)).toThrow(MalformedNameError);
  });
});

describe("renderDataset", () => {
  test("separates tables with a blank line, in assembly order", () => {
    const models: DatasetModels = new Map([
      ["cellsegment", declareRootModel("pinky", 1)],
      ["bouton", declareAnnotationModel("pinky", "bouton", bouton, 1)],
    ]);
    const ddl = renderDataset(models);
    const tables = ddl.split("\n\n");

    expect(tables).toHaveLength(2);
    expect(tables[0]?.startsWith("CREATE TABLE pinky_cellsegment_v1 (")).toBe(true);
    expect(tables[1]?.startsWith("CREATE TABLE pinky_bouton_v1 (")).toBe(true);
  });
});
