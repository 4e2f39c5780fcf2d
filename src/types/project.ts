import type { ModelConfig } from "./config.ts";
import type { InMemorySchemaRegistry } from "../registry/schema-registry.ts";

/** The loaded state of an annotation schema project folder */
export interface Project {
  /** Absolute path to the project root folder */
  rootPath: string;
  /** Project metadata from project.md */
  name: string;
  description: string;
  config: ModelConfig;
  /** Compiled schemas from schemas/, plus the built-in contact schema */
  registry: InMemorySchemaRegistry;
}
