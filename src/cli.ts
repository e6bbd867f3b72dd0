#!/usr/bin/env node
/**
 * Monkey registry CLI.
 *
 *   monkeys create --name luna --species marmoset --age 2 --fruit mango
 *   monkeys list --species marmoset
 *   monkeys search marmo
 *   monkeys --backend ddb export-json --file export/monkeys.json --force
 *
 * Backend: --backend flag, then STORAGE_BACKEND / BACKEND, then json.
 */

import * as fs from "node:fs";
import { pathToFileURL } from "node:url";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import type { Monkey } from "./types/monkey.js";
import { STORAGE_BACKENDS, parseStorageBackend } from "./storage/repository.js";
import { openRegistry } from "./services/registry.js";
import type { MonkeyRegistry } from "./services/registry.js";
import { IMPORT_MODES, exportMonkeys, importMonkeys, readImportFile } from "./services/transfer.js";
import type { ImportMode } from "./services/transfer.js";

/** Columns shown in summaries and tables */
const SUMMARY_FIELDS = ["monkey_id", "name", "species", "age_years", "favourite_fruit"] as const;

type GlobalOptions = {
  db?: string;
  backend?: string;
};

type CreateCommandOptions = {
  name: string;
  species: string;
  age: number;
  fruit: string;
  lastCheckup?: string;
};

type UpdateCommandOptions = Partial<CreateCommandOptions>;

type FilterOptions = {
  name?: string;
  species?: string;
};

type ImportCommandOptions = {
  file: string;
  mode: ImportMode;
  dryRun?: boolean;
};

type ExportCommandOptions = FilterOptions & {
  file: string;
  compact?: boolean;
  force?: boolean;
};

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeRow(row: unknown): string {
  if (typeof row !== "object" || row === null) return "row";
  const name = "name" in row ? row.name : undefined;
  const species = "species" in row ? row.species : undefined;
  return `row name=${String(name)} species=${String(species)}`;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function parseBackend(value: string): string {
  if (!parseStorageBackend(value)) {
    throw new InvalidArgumentError(`Allowed choices are ${STORAGE_BACKENDS.join(", ")} (or ddb).`);
  }
  return value;
}

function parseImportMode(value: string): ImportMode {
  const mode = IMPORT_MODES.find((candidate) => candidate === value.toLowerCase());
  if (!mode) {
    throw new InvalidArgumentError(`Allowed choices are ${IMPORT_MODES.join(", ")}.`);
  }
  return mode;
}

function summarize(record: Monkey): Pick<Monkey, (typeof SUMMARY_FIELDS)[number]> {
  return {
    monkey_id: record.monkey_id,
    name: record.name,
    species: record.species,
    age_years: record.age_years,
    favourite_fruit: record.favourite_fruit,
  };
}

/**
 * Build the CLI program. Exit codes are reported through `setExitCode`.
 */
export function createProgram(
  env: NodeJS.ProcessEnv,
  setExitCode: (code: number) => void
): Command {
  const program = new Command()
    .name("monkeys")
    .description("monkey registry cli")
    .option("--db <path>", "path to the json or sqlite database file (default: data/monkeys.json)")
    .addOption(
      new Option("--backend <name>", `storage backend (${STORAGE_BACKENDS.join(", ")} or ddb)`).argParser(parseBackend)
    )
    .exitOverride();

  /** Run an action against a registry, turning failures into exit code 1. */
  const withRegistry =
    <A extends unknown[]>(fn: (registry: MonkeyRegistry, ...args: A) => Promise<number | void>) =>
    async (...args: A): Promise<void> => {
      const { db, backend } = program.opts<GlobalOptions>();
      let registry: MonkeyRegistry | undefined;
      try {
        registry = openRegistry({ backend, jsonPath: db, sqlitePath: db }, env);
        const code = await fn(registry, ...args);
        if (code) setExitCode(code);
      } catch (err) {
        console.error(`error: ${describe(err)}`);
        setExitCode(1);
      } finally {
        await registry?.close();
      }
    };

  program
    .command("create")
    .description("create a new monkey")
    .requiredOption("--name <name>", "name (2-40 chars)")
    .requiredOption("--species <species>", "capuchin, macaque, marmoset or howler")
    .requiredOption("--age <years>", "age in years (0-45; marmoset <= 22)", parseInteger)
    .requiredOption("--fruit <fruit>", "favourite fruit")
    .option("--last-checkup <datetime>", "iso datetime, optional")
    .action(
      withRegistry(async (registry: MonkeyRegistry, options: CreateCommandOptions) => {
        const created = await registry.create({
          name: options.name,
          species: options.species,
          age_years: options.age,
          favourite_fruit: options.fruit,
          last_checkup_at: options.lastCheckup,
        });
        console.log(JSON.stringify(summarize(created)));
      })
    );

  program
    .command("get")
    .description("get a monkey by id")
    .argument("<monkeyId>")
    .action(
      withRegistry(async (registry: MonkeyRegistry, monkeyId: string) => {
        const record = await registry.get(monkeyId);
        if (!record) {
          console.log("not found");
          return 1;
        }
        console.log(JSON.stringify(record, null, 2));
      })
    );

  program
    .command("update")
    .description("update a monkey")
    .argument("<monkeyId>")
    .option("--name <name>")
    .option("--species <species>")
    .option("--age <years>", "age in years", parseInteger)
    .option("--fruit <fruit>")
    .option("--last-checkup <datetime>")
    .action(
      withRegistry(async (registry: MonkeyRegistry, monkeyId: string, options: UpdateCommandOptions) => {
        const updated = await registry.update(monkeyId, {
          name: options.name,
          species: options.species,
          age_years: options.age,
          favourite_fruit: options.fruit,
          last_checkup_at: options.lastCheckup,
        });
        if (!updated) {
          console.log("not found");
          return 1;
        }
        console.log(JSON.stringify(summarize(updated)));
      })
    );

  program
    .command("delete")
    .description("delete a monkey by id")
    .argument("<monkeyId>")
    .action(
      withRegistry(async (registry: MonkeyRegistry, monkeyId: string) => {
        const deleted = await registry.delete(monkeyId);
        console.log(deleted ? "deleted" : "not found");
        return deleted ? 0 : 1;
      })
    );

  program
    .command("list")
    .description("list monkeys (optional filters)")
    .option("--name <name>", "substring, case-insensitive")
    .option("--species <species>", "exact, case-insensitive")
    .action(
      withRegistry(async (registry: MonkeyRegistry, options: FilterOptions) => {
        const rows = await registry.list({ name: options.name, species: options.species });
        console.table(rows.map(summarize), [...SUMMARY_FIELDS]);
      })
    );

  program
    .command("search")
    .description("search by name or species")
    .argument("<query>")
    .action(
      withRegistry(async (registry: MonkeyRegistry, query: string) => {
        const rows = await registry.search(query);
        console.log(`found ${rows.length} result(s)`);
        for (const row of rows) {
          console.log(JSON.stringify(summarize(row)));
        }
      })
    );

  program
    .command("import-json")
    .description("import monkeys from a json array file into the selected backend")
    .option("--file <path>", "path to source json file", "data/monkeys.json")
    .addOption(
      new Option("--mode <mode>", "create = insert only; upsert = create or update")
        .argParser(parseImportMode)
        .default("create")
    )
    .option("--dry-run", "validate only, no writes")
    .action(
      withRegistry(async (registry: MonkeyRegistry, options: ImportCommandOptions) => {
        const rows = await readImportFile(options.file);
        const summary = await importMonkeys(registry, rows, {
          mode: options.mode,
          dryRun: options.dryRun,
          onRowError: (row, error) => {
            console.warn(`skip: ${describe(error)} for ${describeRow(row)}`);
          },
        });
        console.log(
          `done on backend=${registry.backend}. created=${summary.created}, updated=${summary.updated}, ` +
            `skipped=${summary.skipped}, failed=${summary.failed}, total=${summary.total}`
        );
      })
    );

  program
    .command("export-json")
    .description("export monkeys to a json array file from the selected backend")
    .option("--file <path>", "output path for json file", "export/monkeys-export.json")
    .option("--species <species>", "optional species filter")
    .option("--name <name>", "optional name filter (substring, case-insensitive)")
    .option("--pretty", "pretty print json with indent=2 (default)")
    .option("--compact", "write compact json")
    .option("--force", "overwrite the output file if it already exists")
    .action(
      withRegistry(async (registry: MonkeyRegistry, options: ExportCommandOptions) => {
        const count = await exportMonkeys(registry, options.file, {
          name: options.name,
          species: options.species,
          pretty: !options.compact,
          force: options.force,
        });
        console.log(`exported ${count} record(s) to ${options.file} from backend=${registry.backend}`);
      })
    );

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix) and return the exit code.
 */
export async function run(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let exitCode = 0;
  const program = createProgram(env, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Run if executed directly
if (isMainModule()) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error("error:", err);
      process.exitCode = 1;
    });
}
