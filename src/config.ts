/**
 * Registry configuration.
 *
 * Every setting resolves from explicit input first, then the environment,
 * then a default.
 */

import { ConfigurationError } from "./errors.js";
import { DEFAULT_JSON_PATH, DEFAULT_SQLITE_PATH } from "./storage/base.js";
import { DEFAULT_SPECIES_INDEX } from "./storage/dynamodb.js";
import { getStorageBackend, parseStorageBackend } from "./storage/repository.js";
import type { StorageBackend } from "./storage/repository.js";

export const DEFAULT_TABLE_NAME = "monkeys";
export const DEFAULT_REGION = "eu-west-1";

export interface DynamoConfig {
  tableName: string;
  region: string;
  indexName: string;
  endpoint: string | undefined;
}

export interface RegistryConfig {
  backend: StorageBackend;
  jsonPath: string;
  sqlitePath: string;
  dynamo: DynamoConfig;
}

/**
 * Explicit settings, e.g. from CLI flags. Blank values count as unset.
 */
export interface ConfigOverrides {
  backend?: string | undefined;
  jsonPath?: string | undefined;
  sqlitePath?: string | undefined;
  tableName?: string | undefined;
  region?: string | undefined;
}

function firstSet(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== "");
}

/**
 * Resolve the backend: explicit value, then STORAGE_BACKEND / BACKEND, then json.
 *
 * @throws ConfigurationError for an unknown explicit backend
 */
export function resolveBackend(explicit: string | undefined, env: NodeJS.ProcessEnv): StorageBackend {
  if (explicit !== undefined && explicit.trim() !== "") {
    const backend = parseStorageBackend(explicit);
    if (!backend) {
      throw new ConfigurationError(`unknown storage backend: ${explicit}`, { backend: explicit });
    }
    return backend;
  }
  return getStorageBackend(env);
}

/**
 * Resolve the full configuration.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): RegistryConfig {
  return {
    backend: resolveBackend(overrides.backend, env),
    jsonPath: firstSet(overrides.jsonPath, env.MONKEY_DB_PATH) ?? DEFAULT_JSON_PATH,
    sqlitePath: firstSet(overrides.sqlitePath, env.MONKEY_SQLITE_PATH) ?? DEFAULT_SQLITE_PATH,
    dynamo: {
      tableName: firstSet(overrides.tableName, env.DDB_TABLE) ?? DEFAULT_TABLE_NAME,
      region: firstSet(overrides.region, env.AWS_REGION) ?? DEFAULT_REGION,
      indexName: firstSet(env.DDB_INDEX) ?? DEFAULT_SPECIES_INDEX,
      endpoint: firstSet(env.DDB_ENDPOINT),
    },
  };
}
