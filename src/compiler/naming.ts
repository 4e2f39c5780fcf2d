/**
 * Table naming: canonical names for (dataset, table, version) and the
 * version suffix parser used for version discovery.
 */

import { MalformedNameError } from "../errors.ts";

const VERSION_SEGMENT = /^v(0|[1-9]\d*)$/;

/** Canonical table name: {dataset}_{table}_v{version} */
export function formatTableName(
  dataset: string,
  table: string,
  version: number,
): string {
  const name = `${dataset}_${table}_v${version}`;
  if (!Number.isSafeInteger(version) || version < 0) {
    throw new MalformedNameError(name, "version must be a non-negative integer");
  }
  return name;
}

/** Parse the trailing v<int> segment of a canonical name */
export function getTableVersion(tableName: string): number {
  const sep = tableName.lastIndexOf("_");
  if (sep === -1) {
    throw new MalformedNameError(tableName, "missing _v<version> suffix");
  }

  const match = tableName.slice(sep + 1).match(VERSION_SEGMENT);
  if (!match?.[1]) {
    throw new MalformedNameError(tableName, "missing _v<version> suffix");
  }
  return Number(match[1]);
}

/**
 * Next free version for a dataset, given the table names that already exist
 * in the storage target. Names mentioning the dataset must carry a version.
 */
export function nextVersion(
  existingNames: Iterable<string>,
  dataset: string,
): number {
  let max = -1;
  for (const name of existingNames) {
    if (!name.includes(dataset)) continue;
    max = Math.max(max, getTableVersion(name));
  }
  return max + 1;
}

/** Model name, e.g. ("pinky", "synapse_table") -> "PinkySynapse_table" */
export function modelName(dataset: string, table: string): string {
  return capitalize(dataset) + capitalize(table);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}
