/**
 * JSON File Storage Backend
 *
 * The whole dataset lives in one JSON array. Every operation reads the full
 * snapshot and every mutation writes it back. There is no locking: two
 * processes racing a read-modify-write cycle can drop one writer's change.
 * Fine for small, single-user datasets; use DynamoDB for shared writers.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Monkey, MonkeyFilters, MonkeyPatch } from "../types/monkey.js";
import { ConflictError, DUPLICATE_ID_MESSAGE } from "../errors.js";
import type { MonkeyStore } from "./repository.js";
import {
  applyPatch,
  decodeStoredMonkey,
  ensureFile,
  isErrnoException,
  matchesFilters,
  matchesNameSpecies,
  matchesQuery,
  normalizeTerm,
} from "./base.js";

/**
 * Parse a snapshot. Text that is not a JSON array counts as an empty
 * dataset; entries without the record shape are dropped one by one.
 */
export function parseSnapshot(text: string): Monkey[] {
  if (!text.trim()) return [];

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return [];
  }

  if (!Array.isArray(data)) return [];

  const records: Monkey[] = [];
  for (const entry of data) {
    const record = decodeStoredMonkey(entry);
    if (record) records.push(record);
  }
  return records;
}

/**
 * Create a JSON file store. The file (and its directories) are created with
 * an empty array when missing.
 */
export function createJsonStore(filePath: string): MonkeyStore {
  const resolved = path.resolve(filePath);
  ensureFile(resolved, "[]");

  const loadAll = async (): Promise<Monkey[]> => {
    try {
      const text = await fs.promises.readFile(resolved, "utf-8");
      return parseSnapshot(text);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return [];
      }
      throw err;
    }
  };

  const saveAll = async (items: Monkey[]): Promise<void> => {
    await fs.promises.mkdir(path.dirname(resolved), { recursive: true });
    await fs.promises.writeFile(resolved, JSON.stringify(items, null, 2), "utf-8");
  };

  return {
    backend: "json",

    async create(record: Monkey): Promise<Monkey> {
      const items = await loadAll();
      if (items.some((item) => item.monkey_id === record.monkey_id)) {
        throw new ConflictError("duplicate_id", DUPLICATE_ID_MESSAGE, { monkeyId: record.monkey_id });
      }
      items.push(record);
      await saveAll(items);
      return record;
    },

    async get(monkeyId: string): Promise<Monkey | null> {
      const items = await loadAll();
      return items.find((item) => item.monkey_id === monkeyId) ?? null;
    },

    async update(monkeyId: string, patch: MonkeyPatch): Promise<Monkey | null> {
      const items = await loadAll();
      const index = items.findIndex((item) => item.monkey_id === monkeyId);
      const existing = items[index];
      if (!existing) return null;

      const updated = applyPatch(existing, patch);
      items[index] = updated;
      await saveAll(items);
      return updated;
    },

    async delete(monkeyId: string): Promise<boolean> {
      const items = await loadAll();
      const remaining = items.filter((item) => item.monkey_id !== monkeyId);
      if (remaining.length === items.length) return false;
      await saveAll(remaining);
      return true;
    },

    async list(filters?: MonkeyFilters): Promise<Monkey[]> {
      const items = await loadAll();
      if (!filters) return items;
      return items.filter((item) => matchesFilters(item, filters));
    },

    async search(query: string): Promise<Monkey[]> {
      const q = normalizeTerm(query);
      if (!q) return [];
      const items = await loadAll();
      return items.filter((item) => matchesQuery(item, q));
    },

    async findByNameSpecies(name: string, species: string): Promise<Monkey | null> {
      const items = await loadAll();
      return items.find((item) => matchesNameSpecies(item, name, species)) ?? null;
    },

    async close(): Promise<void> {
      // Nothing held open between operations
    },
  };
}
