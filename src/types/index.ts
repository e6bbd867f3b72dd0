/**
 * Monkey Registry Type Definitions
 */

export type {
  Monkey,
  Species,
  MonkeyFields,
  CreateMonkeyInput,
  UpdateMonkeyInput,
  MonkeyPatch,
  MonkeyFilters,
} from "./monkey.js";
export {
  SPECIES,
  AGE_CAPPED_SPECIES,
  NAME_MIN_LENGTH,
  NAME_MAX_LENGTH,
  MAX_AGE_YEARS,
  CAPPED_MAX_AGE_YEARS,
  MONKEY_FIELDS,
  isSpecies,
} from "./monkey.js";
