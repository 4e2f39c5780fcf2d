/**
 * Model cache: holds compiled table definitions for the lifetime of the
 * cache so every (dataset, table, version) is compiled at most once and
 * repeated lookups return the same instance.
 *
 * There is no eviction: a schema whose shape changes needs a new version.
 */

import type { TableDefinition } from "../types/model.ts";
import { ModelCacheError } from "../errors.ts";
import { formatTableName } from "../compiler/naming.ts";

export class ModelCache {
  private models = new Map<string, TableDefinition>();
  /** Keys whose compile function is currently running */
  private compiling = new Set<string>();
  private compileCount = 0;

  static toKey(dataset: string, table: string, version: number): string {
    return formatTableName(dataset, table, version);
  }

  has(dataset: string, table: string, version: number): boolean {
    return this.models.has(ModelCache.toKey(dataset, table, version));
  }

  get(dataset: string, table: string, version: number): TableDefinition | undefined {
    return this.models.get(ModelCache.toKey(dataset, table, version));
  }

  /**
   * Return the stored definition, or run `compile` and store its result.
   * `compile` is synchronous, so lookup, compilation and store complete in a
   * single turn of the event loop and no two instances are ever stored
   * under one key. A throwing `compile` stores nothing.
   */
  getOrCompile(
    dataset: string,
    table: string,
    version: number,
    compile: () => TableDefinition,
  ): TableDefinition {
    const key = ModelCache.toKey(dataset, table, version);

    const existing = this.models.get(key);
    if (existing) return existing;

    if (this.compiling.has(key)) {
      throw new ModelCacheError(key, "compilation requested its own model");
    }

    this.compiling.add(key);
    try {
      this.compileCount++;
      const model = compile();
      if (model.tableName !== key) {
        throw new ModelCacheError(
          key,
          `compiled definition is named "${model.tableName}"`,
        );
      }
      this.models.set(key, model);
      return model;
    } finally {
      this.compiling.delete(key);
    }
  }

  /** Number of compile functions invoked so far */
  get compilations(): number {
    return this.compileCount;
  }

  get size(): number {
    return this.models.size;
  }

  keys(): string[] {
    return Array.from(this.models.keys());
  }
}
