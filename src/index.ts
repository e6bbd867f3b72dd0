/**
 * Monkey Registry
 *
 * Record management for monkeys with validation, (name, species)
 * uniqueness and a swappable JSON / SQLite / DynamoDB store.
 */

export * from "./types/index.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./storage/index.js";
export {
  validateMonkeyFields,
  createMonkey,
  parseMonkey,
  applyMonkeyUpdates,
  serializeMonkey,
  isIsoDateTime,
  isoNow,
  nextTimestamp,
} from "./services/monkey-model.js";
export { generateMonkeyId } from "./services/ids.js";
export { MonkeyRegistry, openRegistry } from "./services/registry.js";
export {
  importMonkeys,
  exportMonkeys,
  readImportFile,
  sortForExport,
  IMPORT_MODES,
  type ImportMode,
  type ImportOptions,
  type ImportSummary,
  type ExportOptions,
} from "./services/transfer.js";
