/**
 * Numeric normalization for values read from DynamoDB.
 *
 * With `wrapNumbers` the document client hands numbers back as
 * arbitrary-precision wrappers: objects carrying the decimal text in
 * `value`. They are classified as integer or float by whether the value is
 * whole and converted to plain numbers at the record boundary.
 */

export type NumericValue =
  | { kind: "integer"; value: number }
  | { kind: "float"; value: number };

/** Shape of the SDK's wrapped number */
export interface WrappedNumber {
  value: string;
  toString(): string;
}

export type RawNumber = WrappedNumber | bigint | number | string;

/**
 * Detect a wrapped number. Plain objects are records, not numbers.
 */
export function isWrappedNumber(value: unknown): value is WrappedNumber {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  if (isPlainObject(value)) return false;
  return "value" in value && typeof value.value === "string";
}

/**
 * Classify a raw numeric value as integer or float.
 */
export function classifyNumber(raw: RawNumber): NumericValue {
  const text = typeof raw === "string" ? raw.trim() : isWrappedNumber(raw) ? raw.value : raw.toString();
  const value = Number(text);
  if (Number.isInteger(value)) {
    return { kind: "integer", value };
  }
  return { kind: "float", value };
}

/**
 * Convert a raw numeric value to a plain number.
 */
export function toPlainNumber(raw: RawNumber): number {
  return classifyNumber(raw).value;
}

/**
 * True for values that need normalizing before they can be serialized.
 */
export function isArbitraryPrecision(value: unknown): value is WrappedNumber | bigint {
  return isWrappedNumber(value) || typeof value === "bigint";
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively replace arbitrary-precision numbers with plain numbers.
 */
export function normalizeNumbers(value: unknown): unknown {
  if (isArbitraryPrecision(value)) return toPlainNumber(value);
  if (Array.isArray(value)) return value.map((entry) => normalizeNumbers(entry));
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      out[key] = normalizeNumbers(entry);
    }
    return out;
  }
  return value;
}
