/**
 * annotation-models: compiles versioned annotation schemas into relational
 * table definitions and caches one definition per (dataset, table, version).
 */

export type {
  AnnotationSchema,
  FieldDescriptor,
  FieldKind,
  NestedField,
  ReferenceField,
  ScalarField,
  ScalarKind,
  SchemaCategory,
} from "./types/schema.ts";
export { FIELD_KINDS, SCALAR_KINDS } from "./types/schema.ts";
export type { ColumnSpec, ColumnType, DatasetModels, TableDefinition } from "./types/model.ts";
export type { CompilerOptions, ModelConfig } from "./types/config.ts";
export { DEFAULT_COMPILER_OPTIONS, DEFAULT_MODEL_CONFIG, compilerOptionsFrom } from "./types/config.ts";

export {
  AnnotationModelError,
  InvalidSchemaFieldError,
  MalformedNameError,
  ModelCacheError,
  SchemaParseError,
  TableNameConflictError,
  UnknownSchemaError,
  UnsupportedFieldTypeError,
} from "./errors.ts";

export { formatTableName, getTableVersion, modelName, nextVersion } from "./compiler/naming.ts";
export { FIELD_COLUMN_MAP, columnTypeFor, isScalarKind } from "./compiler/type-map.ts";
export { flattenField, type FlattenContext } from "./compiler/field-flattener.ts";
export { declareAnnotationModel, declareRootModel } from "./compiler/model-compiler.ts";
export { compileSchema } from "./compiler/schema-compiler.ts";
export { ModelCache } from "./cache/model-cache.ts";
export {
  CONTACT_TABLE,
  DatasetAssembler,
  type SchemaTablePair,
} from "./assembler/dataset-assembler.ts";
export { InMemorySchemaRegistry, type SchemaRegistry } from "./registry/schema-registry.ts";
export { CONTACT_SCHEMA } from "./registry/contact.ts";
export { loadProject, loadSchemaRegistry } from "./project/loader.ts";
export { loadModelConfig, parseModelConfig } from "./config/loader.ts";
export { renderCreateTable, renderDataset } from "./ddl/render.ts";
