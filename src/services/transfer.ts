/**
 * Bulk import and export of monkey records as JSON arrays.
 *
 * Both run on top of the registry, so imported rows get the same
 * validation and uniqueness rules as single creates.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Monkey } from "../types/monkey.js";
import { ConflictError, ImportFileError, OutputExistsError, isDuplicateNameConflict } from "../errors.js";
import { normalizeNumbers } from "../storage/numbers.js";
import { parseMonkey } from "./monkey-model.js";
import type { MonkeyRegistry } from "./registry.js";

export type ImportMode = "create" | "upsert";

export const IMPORT_MODES: readonly ImportMode[] = ["create", "upsert"];

export interface ImportOptions {
  /** create = insert only; upsert = create, or update the existing match */
  mode: ImportMode;

  /** Validate only; valid rows are counted as created */
  dryRun?: boolean | undefined;

  /** Called for each row that was skipped or failed */
  onRowError?: ((row: unknown, error: unknown) => void) | undefined;
}

export interface ImportSummary {
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  total: number;
}

export interface ExportOptions {
  name?: string | undefined;
  species?: string | undefined;

  /** 2-space indentation; compact otherwise. Defaults to true. */
  pretty?: boolean | undefined;

  /** Overwrite an existing output file */
  force?: boolean | undefined;
}

/**
 * Read an import file: a JSON array of record-shaped objects.
 */
export async function readImportFile(filePath: string): Promise<unknown[]> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ImportFileError(`error reading ${filePath}: ${reason}`, filePath);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ImportFileError(`error reading ${filePath}: ${reason}`, filePath);
  }

  if (!Array.isArray(data)) {
    throw new ImportFileError("json must be an array of objects", filePath);
  }
  return data;
}

/**
 * Import rows through the registry.
 *
 * A row keeps its id and timestamps; missing ones are generated. Rows that
 * clash on (name, species) or id are skipped in create mode. In upsert mode
 * a (name, species) clash updates the existing record instead.
 */
export async function importMonkeys(
  registry: MonkeyRegistry,
  rows: readonly unknown[],
  options: ImportOptions
): Promise<ImportSummary> {
  const summary: ImportSummary = { created: 0, updated: 0, skipped: 0, failed: 0, total: rows.length };

  for (const row of rows) {
    try {
      const record = parseMonkey(row);

      if (options.dryRun) {
        summary.created++;
        continue;
      }

      try {
        await registry.create(record);
        summary.created++;
      } catch (err) {
        if (options.mode !== "upsert" || !isDuplicateNameConflict(err)) throw err;

        const existing = await registry.findByNameSpecies(record.name, record.species);
        if (existing) {
          await registry.update(existing.monkey_id, record);
          summary.updated++;
        } else {
          summary.skipped++;
        }
      }
    } catch (err) {
      if (err instanceof ConflictError) {
        summary.skipped++;
      } else {
        summary.failed++;
      }
      options.onRowError?.(row, err);
    }
  }

  return summary;
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sort records by species, then name, for deterministic output.
 */
export function sortForExport(records: readonly Monkey[]): Monkey[] {
  return [...records].sort(
    (a, b) => compareCodeUnits(a.species, b.species) || compareCodeUnits(a.name, b.name)
  );
}

/**
 * Export (optionally filtered) records to a JSON array file.
 *
 * @returns number of records written
 * @throws OutputExistsError when the file exists and `force` is not set
 */
export async function exportMonkeys(
  registry: MonkeyRegistry,
  filePath: string,
  options: ExportOptions = {}
): Promise<number> {
  const records = sortForExport(
    await registry.list({ name: options.name, species: options.species })
  );
  const rows = normalizeNumbers(records);

  await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  if (fs.existsSync(filePath) && !options.force) {
    throw new OutputExistsError(filePath);
  }

  const pretty = options.pretty ?? true;
  const json = pretty ? JSON.stringify(rows, null, 2) : JSON.stringify(rows);
  await fs.promises.writeFile(filePath, json, "utf-8");
  return records.length;
}
