import type { AnnotationSchema } from "../types/schema.ts";

/** Source of annotation schemas, by name */
export interface SchemaRegistry {
  lookup(name: string): AnnotationSchema | undefined;
  validNames(): ReadonlySet<string>;
}

/** Registry backed by a map; used by the project loader and in tests */
export class InMemorySchemaRegistry implements SchemaRegistry {
  private schemas = new Map<string, AnnotationSchema>();

  constructor(schemas: Iterable<AnnotationSchema> = []) {
    for (const schema of schemas) this.register(schema);
  }

  /** Register a schema under its name, replacing any previous one */
  register(schema: AnnotationSchema): void {
    this.schemas.set(schema.name, schema);
  }

  lookup(name: string): AnnotationSchema | undefined {
    return this.schemas.get(name);
  }

  validNames(): ReadonlySet<string> {
    return new Set(this.schemas.keys());
  }

  list(): AnnotationSchema[] {
    return Array.from(this.schemas.values());
  }
}
