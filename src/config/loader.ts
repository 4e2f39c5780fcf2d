/**
 * Config loader: parses config/models.md for model compilation settings.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { ModelConfig } from "../types/config.ts";
import { DEFAULT_MODEL_CONFIG } from "../types/config.ts";

/** Load model configuration from config/models.md, falling back to defaults */
export async function loadModelConfig(projectPath: string): Promise<ModelConfig> {
  let content: string;
  try {
    content = await readFile(join(projectPath, "config", "models.md"), "utf-8");
  } catch {
    return { ...DEFAULT_MODEL_CONFIG };
  }
  return parseModelConfig(content);
}

/** Extract model settings from markdown content */
export function parseModelConfig(content: string): ModelConfig {
  const config = { ...DEFAULT_MODEL_CONFIG };

  const rootMatch = content.match(/\*\*Root model:\*\*\s*(\w+)/i);
  if (rootMatch?.[1]) {
    config.rootModel = rootMatch[1];
  }

  const versionMatch = content.match(/\*\*Default version:\*\*\s*(\S+)/i);
  if (versionMatch?.[1] && /^(0|[1-9]\d*)$/.test(versionMatch[1])) {
    config.defaultVersion = Number(versionMatch[1]);
  }

  const contactsMatch = content.match(/\*\*Include contacts:\*\*\s*(\w+)/i);
  if (contactsMatch?.[1]) {
    config.includeContacts = ["yes", "true", "on"].includes(
      contactsMatch[1].toLowerCase(),
    );
  }

  return config;
}
