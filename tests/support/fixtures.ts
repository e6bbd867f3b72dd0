/**
 * Record fixtures and per-backend store factories shared by the suites.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { Monkey } from "../../src/types/monkey.js";
import type { MonkeyStore } from "../../src/storage/repository.js";
import { createJsonStore } from "../../src/storage/json.js";
import { createSqliteStore, MEMORY_DATABASE } from "../../src/storage/sqlite.js";
import { createDynamoStore } from "../../src/storage/dynamodb.js";
import { createMonkey, validateMonkeyFields } from "../../src/services/monkey-model.js";
import { MemoryTable } from "./memory-table.js";

export const CREATED_AT = new Date("2024-01-01T00:00:00Z");

/**
 * Build a valid record created at CREATED_AT.
 */
export function makeMonkey(fields: {
  name: string;
  species: string;
  age_years: number;
  favourite_fruit?: string;
  last_checkup_at?: string | null;
}): Monkey {
  return createMonkey(
    validateMonkeyFields({ favourite_fruit: "banana", ...fields }),
    CREATED_AT
  );
}

/** Sorted ids, for order-insensitive comparisons across backends */
export function idsOf(records: readonly Monkey[]): string[] {
  return records.map((record) => record.monkey_id).sort();
}

export interface OpenedStore {
  store: MonkeyStore;
  cleanup: () => Promise<void>;
}

export interface BackendFixture {
  name: string;
  open: () => OpenedStore;
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export const BACKENDS: BackendFixture[] = [
  {
    name: "json",
    open: () => {
      const dir = makeTempDir("monkeys-json-");
      const store = createJsonStore(path.join(dir, "data", "monkeys.json"));
      return {
        store,
        cleanup: async () => {
          await store.close();
          fs.rmSync(dir, { recursive: true, force: true });
        },
      };
    },
  },
  {
    name: "sqlite",
    open: () => {
      const store = createSqliteStore(MEMORY_DATABASE);
      return { store, cleanup: () => store.close() };
    },
  },
  {
    name: "dynamodb",
    open: () => {
      const store = createDynamoStore({ table: new MemoryTable() });
      return { store, cleanup: () => store.close() };
    },
  },
];
