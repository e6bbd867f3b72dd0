/**
 * Repository interface for storage backends.
 *
 * Every backend (JSON file, SQLite, DynamoDB) implements this contract with
 * identical filter and search semantics. Records cross it in their flat
 * wire form.
 */

import type { Monkey, MonkeyFilters, MonkeyPatch } from "../types/monkey.js";

/**
 * Monkey storage operations.
 */
export interface MonkeyStore {
  /** Which backend implements this store */
  readonly backend: StorageBackend;

  /**
   * Persist a new record. Throws ConflictError when the id already exists;
   * (name, species) uniqueness is enforced by the caller.
   */
  create(record: Monkey): Promise<Monkey>;

  /** Get a record by id, or null */
  get(monkeyId: string): Promise<Monkey | null>;

  /**
   * Overwrite stored fields with the non-null patch values. Refreshes
   * `updated_at` unless the patch carries one. Null when the id is unknown.
   */
  update(monkeyId: string, patch: MonkeyPatch): Promise<Monkey | null>;

  /** Delete by id; false when nothing was stored under it */
  delete(monkeyId: string): Promise<boolean>;

  /**
   * List records. Species is an exact and name a substring match, both
   * case-insensitive. Blank filters are ignored.
   */
  list(filters?: MonkeyFilters): Promise<Monkey[]>;

  /**
   * Records whose name or species contains the query, case-insensitively.
   * A blank query matches nothing.
   */
  search(query: string): Promise<Monkey[]>;

  /** Exact case-insensitive (name, species) lookup for uniqueness checks */
  findByNameSpecies(name: string, species: string): Promise<Monkey | null>;

  /** Release handles and clients */
  close(): Promise<void>;
}

/**
 * Storage backend type.
 */
export type StorageBackend = "json" | "sqlite" | "dynamodb";

export const STORAGE_BACKENDS: readonly StorageBackend[] = ["json", "sqlite", "dynamodb"];

/**
 * Map a backend name to its discriminator. "ddb" is an alias for DynamoDB.
 * Returns null for unknown names.
 */
export function parseStorageBackend(value: string): StorageBackend | null {
  switch (value.trim().toLowerCase()) {
    case "json":
      return "json";
    case "sqlite":
      return "sqlite";
    case "ddb":
    case "dynamodb":
      return "dynamodb";
    default:
      return null;
  }
}

/**
 * Get the storage backend from environment, defaulting to JSON.
 */
export function getStorageBackend(env: NodeJS.ProcessEnv = process.env): StorageBackend {
  const value = env.STORAGE_BACKEND ?? env.BACKEND;
  if (!value) return "json";
  return parseStorageBackend(value) ?? "json";
}
