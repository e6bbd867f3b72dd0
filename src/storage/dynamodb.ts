/**
 * DynamoDB Storage Backend
 *
 * One item per monkey keyed by PK = SK = "MONKEY#<monkey_id>", with
 * lowercase copies of name and species for case-insensitive lookups. The
 * `GSI_Species` index (partition `species_lc`, sort `name_lc`) serves
 * species-filtered reads; anything it cannot answer, or any index failure,
 * falls back to a table scan.
 *
 * Index reads are eventually consistent. Uniqueness lookups therefore
 * confirm an index miss with a strongly consistent scan unless
 * `consistentReads` is turned off.
 *
 * Updates are read-modify-write with an unconditional put: concurrent
 * writers to the same record can lose updates. Only create is protected, by
 * a conditional write on the key.
 */

import type { Monkey, MonkeyFilters, MonkeyPatch } from "../types/monkey.js";
import { BackendError, ConflictError, DUPLICATE_ID_MESSAGE } from "../errors.js";
import { serializeMonkey } from "../services/monkey-model.js";
import type { MonkeyStore } from "./repository.js";
import { applyPatch, decodeStoredMonkey, normalizeTerm } from "./base.js";
import { normalizeNumbers } from "./numbers.js";
import { where } from "./dynamo/conditions.js";
import type { Condition } from "./dynamo/conditions.js";
import type { ItemKey, KeyValueTable, TableItem } from "./dynamo/table.js";

export const MONKEY_ENTITY = "MONKEY";
export const DEFAULT_SPECIES_INDEX = "GSI_Species";

/** Attributes that exist only for DynamoDB access patterns */
const HELPER_ATTRIBUTES = new Set(["PK", "SK", "entity", "name_lc", "species_lc"]);

export interface DynamoStoreOptions {
  table: KeyValueTable;

  /** Secondary index on (species_lc, name_lc) */
  indexName?: string | undefined;

  /**
   * Use strongly consistent reads for gets and scans, and confirm index
   * misses in uniqueness lookups with a scan. Defaults to true.
   */
  consistentReads?: boolean | undefined;
}

/**
 * Primary key for a monkey id.
 */
export function monkeyKey(monkeyId: string): ItemKey {
  const key = `${MONKEY_ENTITY}#${monkeyId}`;
  return { PK: key, SK: key };
}

/**
 * Record → item, dropping nulls and adding key and helper attributes.
 */
export function toItem(record: Monkey): TableItem {
  const item: TableItem = { ...monkeyKey(record.monkey_id), entity: MONKEY_ENTITY };
  for (const [field, value] of Object.entries(serializeMonkey(record))) {
    if (value !== null) item[field] = value;
  }
  item.name_lc = normalizeTerm(record.name);
  item.species_lc = normalizeTerm(record.species);
  return item;
}

/**
 * Item → record, stripping helper attributes and normalizing numbers.
 */
export function fromItem(item: TableItem): Monkey {
  const data: Record<string, unknown> = {};
  for (const [attribute, value] of Object.entries(item)) {
    if (HELPER_ATTRIBUTES.has(attribute)) continue;
    data[attribute] = normalizeNumbers(value);
  }

  const record = decodeStoredMonkey(data);
  if (!record) {
    throw new BackendError(`malformed item ${String(item.PK)}`, undefined, { item: data });
  }
  return record;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Create a DynamoDB store on a table gateway.
 */
export function createDynamoStore(options: DynamoStoreOptions): MonkeyStore {
  const { table } = options;
  const indexName = options.indexName ?? DEFAULT_SPECIES_INDEX;
  const consistentReads = options.consistentReads ?? true;
  const isMonkey = where.eq("entity", MONKEY_ENTITY);

  const call = async <T>(operation: string, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (err) {
      throw new BackendError(`dynamodb ${operation} failed: ${describe(err)}`, err, { operation });
    }
  };

  const scan = async (filter: Condition): Promise<Monkey[]> => {
    const items = await call("scan", () => table.scan({ filter, consistentRead: consistentReads }));
    return items.map(fromItem);
  };

  /**
   * Query the species index. Null when the index is unavailable or the
   * query fails, so the caller can fall back to a scan.
   */
  const queryIndex = async (
    species: string,
    refinement: { sortKey?: Condition; filter?: Condition } = {}
  ): Promise<Monkey[] | null> => {
    let items: TableItem[];
    try {
      items = await table.query({
        indexName,
        partitionKey: { attribute: "species_lc", value: species },
        sortKey: refinement.sortKey,
        filter: refinement.filter,
      });
    } catch (err) {
      console.warn(`[dynamodb] query on ${indexName} failed, falling back to scan: ${describe(err)}`);
      return null;
    }
    return items.map(fromItem);
  };

  return {
    backend: "dynamodb",

    async create(record: Monkey): Promise<Monkey> {
      const item = toItem(record);
      const written = await call("put", () => table.putItem(item, where.notExists("PK")));
      if (!written) {
        throw new ConflictError("duplicate_id", DUPLICATE_ID_MESSAGE, { monkeyId: record.monkey_id });
      }
      return serializeMonkey(record);
    },

    async get(monkeyId: string): Promise<Monkey | null> {
      const item = await call("get", () => table.getItem(monkeyKey(monkeyId), consistentReads));
      return item ? fromItem(item) : null;
    },

    async update(monkeyId: string, patch: MonkeyPatch): Promise<Monkey | null> {
      const current = await this.get(monkeyId);
      if (!current) return null;

      const updated = applyPatch(current, patch);
      await call("put", () => table.putItem(toItem(updated)));
      return updated;
    },

    async delete(monkeyId: string): Promise<boolean> {
      const previous = await call("delete", () => table.deleteItem(monkeyKey(monkeyId)));
      return previous !== undefined;
    },

    async list(filters: MonkeyFilters = {}): Promise<Monkey[]> {
      const species = normalizeTerm(filters.species);
      const name = normalizeTerm(filters.name);

      if (species) {
        const hits = await queryIndex(
          species,
          name ? { filter: where.contains("name_lc", name) } : {}
        );
        if (hits) return hits;
      }

      const conditions: Condition[] = [isMonkey];
      if (species) conditions.push(where.eq("species_lc", species));
      if (name) conditions.push(where.contains("name_lc", name));
      return scan(where.and(...conditions));
    },

    async search(query: string): Promise<Monkey[]> {
      const q = normalizeTerm(query);
      if (!q) return [];

      // The query may be a species name; the index answers that directly.
      const speciesHits = await queryIndex(q);
      if (speciesHits && speciesHits.length > 0) {
        const nameHits = await scan(
          where.and(isMonkey, where.ne("species_lc", q), where.contains("name_lc", q))
        );
        return [...speciesHits, ...nameHits];
      }

      return scan(
        where.and(isMonkey, where.or(where.contains("name_lc", q), where.contains("species_lc", q)))
      );
    },

    async findByNameSpecies(name: string, species: string): Promise<Monkey | null> {
      const n = normalizeTerm(name);
      const s = normalizeTerm(species);

      const hits = await queryIndex(s, { sortKey: where.eq("name_lc", n) });
      const [hit] = hits ?? [];
      if (hit) return hit;
      if (hits && !consistentReads) return null;

      const [match] = await scan(
        where.and(isMonkey, where.eq("species_lc", s), where.eq("name_lc", n))
      );
      return match ?? null;
    },

    async close(): Promise<void> {
      table.destroy();
    },
  };
}
