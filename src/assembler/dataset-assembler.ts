/**
 * Dataset assembler: builds the root entity table of a dataset, one table
 * per requested (schema, table) pair, and optionally the built-in contact
 * table.
 *
 * Assembly is all-or-nothing. Schema names are validated before anything is
 * compiled, new definitions are staged, and the cache only sees them once
 * every table of the request has compiled.
 */

import type { AnnotationSchema } from "../types/schema.ts";
import type { DatasetModels, TableDefinition } from "../types/model.ts";
import { DEFAULT_COMPILER_OPTIONS, type CompilerOptions } from "../types/config.ts";
import type { SchemaRegistry } from "../registry/schema-registry.ts";
import { CONTACT_SCHEMA } from "../registry/contact.ts";
import { ModelCache } from "../cache/model-cache.ts";
import { declareAnnotationModel, declareRootModel } from "../compiler/model-compiler.ts";
import { TableNameConflictError, UnknownSchemaError } from "../errors.ts";

/** [schema name, table name] */
export type SchemaTablePair = readonly [schemaName: string, tableName: string];

export const CONTACT_TABLE = "contact";

interface StagedModel {
  /** Key in the returned dataset map */
  key: string;
  table: string;
  model: TableDefinition;
}

export class DatasetAssembler {
  private registry: SchemaRegistry;
  private cache: ModelCache;
  private options: CompilerOptions;

  constructor(
    registry: SchemaRegistry,
    cache: ModelCache = new ModelCache(),
    options: CompilerOptions = DEFAULT_COMPILER_OPTIONS,
  ) {
    this.registry = registry;
    this.cache = cache;
    this.options = options;
  }

  /** Throw UnknownSchemaError naming every unregistered schema */
  validate(pairs: readonly SchemaTablePair[]): void {
    const valid = this.registry.validNames();
    const unknown: string[] = [];
    for (const [schemaName] of pairs) {
      if (!valid.has(schemaName) && !unknown.includes(schemaName)) {
        unknown.push(schemaName);
      }
    }
    if (unknown.length > 0) throw new UnknownSchemaError(unknown);
  }

  /**
   * Throw TableNameConflictError when a pair targets the root or contact
   * table, or when one table name is requested for two schemas.
   */
  checkTableNames(pairs: readonly SchemaTablePair[], includeContacts: boolean): void {
    const owners = new Map<string, string>();
    for (const [schemaName, tableName] of pairs) {
      if (tableName === this.options.rootTable) {
        throw new TableNameConflictError(tableName, "reserved for the root entity table");
      }
      if (includeContacts && tableName === CONTACT_TABLE) {
        throw new TableNameConflictError(tableName, "reserved for the contact table");
      }
      const owner = owners.get(tableName);
      if (owner !== undefined && owner !== schemaName) {
        throw new TableNameConflictError(
          tableName,
          `requested for both "${owner}" and "${schemaName}"`,
        );
      }
      owners.set(tableName, schemaName);
    }
  }

  /** Build the models of one dataset, keyed by table name */
  assembleDataset(
    dataset: string,
    pairs: readonly SchemaTablePair[],
    version: number,
    includeContacts = false,
  ): DatasetModels {
    this.validate(pairs);
    this.checkTableNames(pairs, includeContacts);
    return this.commit(dataset, version, this.stage(dataset, pairs, version, includeContacts));
  }

  /** Build the models of several datasets; validation covers all of them first */
  assembleAll(
    datasets: readonly string[],
    pairs: readonly SchemaTablePair[],
    version: number,
    includeContacts = false,
  ): Map<string, DatasetModels> {
    this.validate(pairs);
    this.checkTableNames(pairs, includeContacts);

    const staged = datasets.map(
      (dataset) => [dataset, this.stage(dataset, pairs, version, includeContacts)] as const,
    );

    const result = new Map<string, DatasetModels>();
    for (const [dataset, models] of staged) {
      result.set(dataset, this.commit(dataset, version, models));
    }
    return result;
  }

  /** Compile (or fetch) a single annotation table by schema name */
  makeAnnotationModel(
    dataset: string,
    schemaName: string,
    tableName: string,
    version: number,
  ): TableDefinition {
    if (tableName === this.options.rootTable) {
      throw new TableNameConflictError(tableName, "reserved for the root entity table");
    }
    const schema = this.lookup(schemaName);
    return this.cache.getOrCompile(dataset, tableName, version, () =>
      declareAnnotationModel(dataset, tableName, schema, version, this.options),
    );
  }

  /** Compile (or fetch) the dataset's root entity table */
  makeRootModel(dataset: string, version: number): TableDefinition {
    return this.cache.getOrCompile(dataset, this.options.rootTable, version, () =>
      declareRootModel(dataset, version, this.options),
    );
  }

  private stage(
    dataset: string,
    pairs: readonly SchemaTablePair[],
    version: number,
    includeContacts: boolean,
  ): StagedModel[] {
    const root = this.options.rootTable;
    const staged: StagedModel[] = [{
      key: root,
      table: root,
      model: this.cache.get(dataset, root, version) ?? declareRootModel(dataset, version, this.options),
    }];

    for (const [schemaName, tableName] of pairs) {
      staged.push({
        key: tableName,
        table: tableName,
        model: this.stageAnnotation(dataset, tableName, this.lookup(schemaName), version),
      });
    }

    if (includeContacts) {
      staged.push({
        key: CONTACT_TABLE,
        table: CONTACT_TABLE,
        model: this.stageAnnotation(dataset, CONTACT_TABLE, CONTACT_SCHEMA, version),
      });
    }

    return staged;
  }

  private stageAnnotation(
    dataset: string,
    tableName: string,
    schema: AnnotationSchema,
    version: number,
  ): TableDefinition {
    return this.cache.get(dataset, tableName, version) ??
      declareAnnotationModel(dataset, tableName, schema, version, this.options);
  }

  private commit(dataset: string, version: number, staged: StagedModel[]): DatasetModels {
    const models: DatasetModels = new Map();
    for (const { key, table, model } of staged) {
      models.set(key, this.cache.getOrCompile(dataset, table, version, () => model));
    }
    return models;
  }

  private lookup(schemaName: string): AnnotationSchema {
    const schema = this.registry.lookup(schemaName);
    if (!schema) throw new UnknownSchemaError([schemaName]);
    return schema;
  }
}
