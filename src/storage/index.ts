/**
 * Storage Layer
 *
 * Monkey storage on a JSON file (default), SQLite, or DynamoDB.
 * Set STORAGE_BACKEND (or BACKEND) to "sqlite" or "ddb" to switch.
 */

import type { RegistryConfig } from "../config.js";
import type { MonkeyStore } from "./repository.js";
import { createJsonStore } from "./json.js";
import { createSqliteStore } from "./sqlite.js";
import { createDynamoStore } from "./dynamodb.js";
import { createDocumentTable } from "./dynamo/table.js";

// Re-export repository types
export {
  type MonkeyStore,
  type StorageBackend,
  STORAGE_BACKENDS,
  getStorageBackend,
  parseStorageBackend,
} from "./repository.js";

export { createJsonStore, parseSnapshot } from "./json.js";
export { createSqliteStore, MEMORY_DATABASE } from "./sqlite.js";
export {
  createDynamoStore,
  monkeyKey,
  toItem,
  fromItem,
  MONKEY_ENTITY,
  DEFAULT_SPECIES_INDEX,
  type DynamoStoreOptions,
} from "./dynamodb.js";
export {
  createDocumentTable,
  createDocumentClient,
  type KeyValueTable,
  type TableItem,
  type ItemKey,
  type QueryRequest,
  type ScanRequest,
} from "./dynamo/table.js";
export { ExpressionBuilder, where, type Condition } from "./dynamo/conditions.js";
export { classifyNumber, normalizeNumbers, toPlainNumber, type NumericValue } from "./numbers.js";

/**
 * Build the store selected by the configuration.
 */
export function createMonkeyStore(config: RegistryConfig): MonkeyStore {
  switch (config.backend) {
    case "json":
      return createJsonStore(config.jsonPath);
    case "sqlite":
      return createSqliteStore(config.sqlitePath);
    case "dynamodb":
      return createDynamoStore({
        table: createDocumentTable({
          tableName: config.dynamo.tableName,
          region: config.dynamo.region,
          endpoint: config.dynamo.endpoint,
        }),
        indexName: config.dynamo.indexName,
      });
  }
}
