/**
 * Error taxonomy for schema compilation. Plain Error subclasses so the
 * compiler stays free of transport concerns; the MCP layer turns them into
 * tool errors.
 */

export class AnnotationModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AnnotationModelError";
  }
}

/** One or more requested schema names are not registered */
export class UnknownSchemaError extends AnnotationModelError {
  readonly names: string[];

  constructor(names: string[]) {
    super(`${JSON.stringify(names)} are invalid schema types`);
    this.name = "UnknownSchemaError";
    this.names = names;
  }
}

/** A field's kind has no column mapping and is not a known composite */
export class UnsupportedFieldTypeError extends AnnotationModelError {
  readonly field: string;
  readonly kind: string;

  constructor(field: string, kind: string) {
    super(`Field "${field}": type "${kind}" not supported`);
    this.name = "UnsupportedFieldTypeError";
    this.field = field;
    this.kind = kind;
  }
}

/** A structurally unsupported field shape */
export class InvalidSchemaFieldError extends AnnotationModelError {
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Field "${field}": ${reason}`);
    this.name = "InvalidSchemaFieldError";
    this.field = field;
  }
}

export class MalformedNameError extends AnnotationModelError {
  readonly tableName: string;

  constructor(tableName: string, reason: string) {
    super(`Malformed table name "${tableName}": ${reason}`);
    this.name = "MalformedNameError";
    this.tableName = tableName;
  }
}

export class ModelCacheError extends AnnotationModelError {
  readonly key: string;

  constructor(key: string, reason: string) {
    super(`Model "${key}": ${reason}`);
    this.name = "ModelCacheError";
    this.key = key;
  }
}

export class SchemaParseError extends AnnotationModelError {
  readonly sourcePath: string;

  constructor(sourcePath: string, reason: string) {
    super(`${sourcePath}: ${reason}`);
    this.name = "SchemaParseError";
    this.sourcePath = sourcePath;
  }
}

/** Two entries of one assembly request resolve to the same table */
export class TableNameConflictError extends AnnotationModelError {
  readonly table: string;

  constructor(table: string, reason: string) {
    super(`Table "${table}": ${reason}`);
    this.name = "TableNameConflictError";
    this.table = table;
  }
}
