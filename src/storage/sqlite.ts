/**
 * SQLite Storage Backend
 *
 * Indexed local storage using better-sqlite3. The record is kept as JSON in
 * `data`; lowercase name/species columns back the filters and the
 * (species, name) index mirrors the DynamoDB secondary index.
 */

import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as path from "node:path";
import type { Monkey, MonkeyFilters, MonkeyPatch } from "../types/monkey.js";
import { ConflictError, DUPLICATE_ID_MESSAGE } from "../errors.js";
import type { MonkeyStore } from "./repository.js";
import { applyPatch, decodeStoredMonkey, normalizeTerm } from "./base.js";

/** In-memory database path understood by SQLite */
export const MEMORY_DATABASE = ":memory:";

interface DataRow {
  data: string;
}

/**
 * Open a database and make sure the schema exists.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== MEMORY_DATABASE) {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const database = new Database(dbPath);
  if (dbPath !== MEMORY_DATABASE) {
    database.pragma("journal_mode = WAL");
  }
  database.pragma("synchronous = NORMAL");

  initializeSchema(database);
  return database;
}

/**
 * Initialize database schema.
 */
function initializeSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS monkeys (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      name_lc TEXT NOT NULL,
      species_lc TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_monkeys_species_name ON monkeys(species_lc, name_lc);
  `);
}

/**
 * Decode rows, skipping any whose data no longer parses.
 */
function decodeRows(rows: DataRow[]): Monkey[] {
  const records: Monkey[] = [];
  for (const row of rows) {
    const record = decodeRow(row);
    if (record) records.push(record);
  }
  return records;
}

function decodeRow(row: DataRow | undefined): Monkey | null {
  if (!row) return null;
  try {
    return decodeStoredMonkey(JSON.parse(row.data));
  } catch {
    return null;
  }
}

/**
 * Create a SQLite store on a database file (or ":memory:").
 */
export function createSqliteStore(dbPath: string): MonkeyStore {
  const database = openDatabase(dbPath);

  const insert = database.prepare<[string, string, string, string, string, string]>(`
    INSERT INTO monkeys (id, data, name_lc, species_lc, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(id) DO NOTHING
  `);
  const replace = database.prepare<[string, string, string, string, string]>(`
    UPDATE monkeys
    SET data = ?, name_lc = ?, species_lc = ?, updated_at = ?
    WHERE id = ?
  `);
  const selectById = database.prepare<[string], DataRow>(
    "SELECT data FROM monkeys WHERE id = ?"
  );
  const deleteById = database.prepare<[string]>("DELETE FROM monkeys WHERE id = ?");

  const selectWhere = (clauses: string[], params: string[]): Monkey[] => {
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = database
      .prepare<string[], DataRow>(`SELECT data FROM monkeys ${where} ORDER BY rowid`)
      .all(...params);
    return decodeRows(rows);
  };

  return {
    backend: "sqlite",

    async create(record: Monkey): Promise<Monkey> {
      const result = insert.run(
        record.monkey_id,
        JSON.stringify(record),
        normalizeTerm(record.name),
        normalizeTerm(record.species),
        record.created_at,
        record.updated_at
      );
      if (result.changes === 0) {
        throw new ConflictError("duplicate_id", DUPLICATE_ID_MESSAGE, { monkeyId: record.monkey_id });
      }
      return record;
    },

    async get(monkeyId: string): Promise<Monkey | null> {
      return decodeRow(selectById.get(monkeyId));
    },

    async update(monkeyId: string, patch: MonkeyPatch): Promise<Monkey | null> {
      const existing = decodeRow(selectById.get(monkeyId));
      if (!existing) return null;

      const updated = applyPatch(existing, patch);
      replace.run(
        JSON.stringify(updated),
        normalizeTerm(updated.name),
        normalizeTerm(updated.species),
        updated.updated_at,
        monkeyId
      );
      return updated;
    },

    async delete(monkeyId: string): Promise<boolean> {
      return deleteById.run(monkeyId).changes > 0;
    },

    async list(filters: MonkeyFilters = {}): Promise<Monkey[]> {
      const clauses: string[] = [];
      const params: string[] = [];

      const species = normalizeTerm(filters.species);
      if (species) {
        clauses.push("species_lc = ?");
        params.push(species);
      }
      const name = normalizeTerm(filters.name);
      if (name) {
        clauses.push("instr(name_lc, ?) > 0");
        params.push(name);
      }
      return selectWhere(clauses, params);
    },

    async search(query: string): Promise<Monkey[]> {
      const q = normalizeTerm(query);
      if (!q) return [];
      return selectWhere(["(instr(name_lc, ?) > 0 OR instr(species_lc, ?) > 0)"], [q, q]);
    },

    async findByNameSpecies(name: string, species: string): Promise<Monkey | null> {
      const [match] = selectWhere(
        ["species_lc = ?", "name_lc = ?"],
        [normalizeTerm(species), normalizeTerm(name)]
      );
      return match ?? null;
    },

    async close(): Promise<void> {
      database.close();
    },
  };
}
