/**
 * Monkey registry service.
 *
 * Orchestrates validation, (name, species) uniqueness and persistence on
 * whichever store is configured. Nothing reaches a store without passing
 * the model first.
 */

import type {
  CreateMonkeyInput,
  Monkey,
  MonkeyFilters,
  UpdateMonkeyInput,
} from "../types/monkey.js";
import { ConflictError, DUPLICATE_NAME_MESSAGE } from "../errors.js";
import type { MonkeyStore } from "../storage/repository.js";
import { createMonkeyStore } from "../storage/index.js";
import { resolveConfig } from "../config.js";
import type { ConfigOverrides } from "../config.js";
import { applyMonkeyUpdates, parseMonkey } from "./monkey-model.js";

export class MonkeyRegistry {
  constructor(private readonly store: MonkeyStore) {}

  /** Backend of the underlying store */
  get backend(): MonkeyStore["backend"] {
    return this.store.backend;
  }

  /**
   * Validate, check uniqueness and persist a new monkey. A given id and
   * timestamps are kept.
   *
   * @throws ValidationError when a field is invalid
   * @throws ConflictError when the (name, species) pair or the id is taken
   */
  async create(input: CreateMonkeyInput): Promise<Monkey> {
    const record = parseMonkey(input);
    await this.ensureUnique(record.name, record.species);
    return this.store.create(record);
  }

  async get(monkeyId: string): Promise<Monkey | null> {
    return this.store.get(monkeyId);
  }

  /**
   * Apply a partial update through the model and persist the full result.
   * Returns null when the id is unknown.
   */
  async update(monkeyId: string, updates: UpdateMonkeyInput): Promise<Monkey | null> {
    const current = await this.store.get(monkeyId);
    if (!current) return null;

    const next = applyMonkeyUpdates(parseMonkey(current), updates);
    await this.ensureUnique(next.name, next.species, monkeyId);

    return this.store.update(monkeyId, {
      name: next.name,
      species: next.species,
      age_years: next.age_years,
      favourite_fruit: next.favourite_fruit,
      last_checkup_at: next.last_checkup_at,
      updated_at: next.updated_at,
    });
  }

  async delete(monkeyId: string): Promise<boolean> {
    return this.store.delete(monkeyId);
  }

  async list(filters?: MonkeyFilters): Promise<Monkey[]> {
    return this.store.list(filters);
  }

  async search(query: string): Promise<Monkey[]> {
    return this.store.search(query);
  }

  async findByNameSpecies(name: string, species: string): Promise<Monkey | null> {
    return this.store.findByNameSpecies(name, species);
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private async ensureUnique(name: string, species: string, excludeId?: string): Promise<void> {
    const existing = await this.store.findByNameSpecies(name, species);
    if (existing && existing.monkey_id !== excludeId) {
      throw new ConflictError("duplicate_name", DUPLICATE_NAME_MESSAGE, {
        name,
        species,
        existingId: existing.monkey_id,
      });
    }
  }
}

/**
 * Resolve configuration and open a registry on the selected backend.
 */
export function openRegistry(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): MonkeyRegistry {
  return new MonkeyRegistry(createMonkeyStore(resolveConfig(overrides, env)));
}
