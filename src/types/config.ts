/** Configuration types parsed from config/models.md */

export interface ModelConfig {
  /** Model name of the per-dataset root entity table; lowercased for its table name */
  rootModel: string;
  /** Version used when a request does not name one */
  defaultVersion: number;
  /** Whether dataset assembly adds the built-in contact table by default */
  includeContacts: boolean;
}

/** Defaults when no config/models.md is found */
export const DEFAULT_MODEL_CONFIG: ModelConfig = {
  rootModel: "CellSegment",
  defaultVersion: 1,
  includeContacts: false,
};

/** Options threaded through the compiler */
export interface CompilerOptions {
  /** Model name of the root entity, e.g. "CellSegment" */
  rootModel: string;
  /** Logical (lowercase) name of the root entity table */
  rootTable: string;
}

export function compilerOptionsFrom(config: ModelConfig): CompilerOptions {
  return {
    rootModel: config.rootModel,
    rootTable: config.rootModel.toLowerCase(),
  };
}

export const DEFAULT_COMPILER_OPTIONS: CompilerOptions =
  compilerOptionsFrom(DEFAULT_MODEL_CONFIG);
