/**
 * Structured DynamoDB conditions.
 *
 * Key conditions and filters are built as plain data and compiled into
 * expression strings with `#name` / `:value` placeholders.
 */

export type ConditionValue = string | number;

export type Condition =
  | { op: "eq"; attribute: string; value: ConditionValue }
  | { op: "ne"; attribute: string; value: ConditionValue }
  | { op: "contains"; attribute: string; value: string }
  | { op: "not_exists"; attribute: string }
  | { op: "and"; conditions: Condition[] }
  | { op: "or"; conditions: Condition[] };

/**
 * Condition constructors, e.g. `where.and(where.eq("entity", "MONKEY"), ...)`.
 */
export const where = {
  eq: (attribute: string, value: ConditionValue): Condition => ({ op: "eq", attribute, value }),
  ne: (attribute: string, value: ConditionValue): Condition => ({ op: "ne", attribute, value }),
  contains: (attribute: string, value: string): Condition => ({ op: "contains", attribute, value }),
  notExists: (attribute: string): Condition => ({ op: "not_exists", attribute }),
  and: (...conditions: Condition[]): Condition => ({ op: "and", conditions }),
  or: (...conditions: Condition[]): Condition => ({ op: "or", conditions }),
};

/**
 * Collects attribute name/value placeholders while compiling conditions.
 * One builder serves a whole request so key condition and filter share maps.
 */
export class ExpressionBuilder {
  private readonly names = new Map<string, string>();
  private readonly values: Record<string, ConditionValue> = {};
  private valueCount = 0;

  /**
   * Compile a condition to an expression string.
   */
  compile(condition: Condition): string {
    switch (condition.op) {
      case "eq":
        return `${this.name(condition.attribute)} = ${this.value(condition.value)}`;
      case "ne":
        return `${this.name(condition.attribute)} <> ${this.value(condition.value)}`;
      case "contains":
        return `contains(${this.name(condition.attribute)}, ${this.value(condition.value)})`;
      case "not_exists":
        return `attribute_not_exists(${this.name(condition.attribute)})`;
      case "and":
        return this.join(condition.conditions, "AND");
      case "or":
        return this.join(condition.conditions, "OR");
    }
  }

  /** `ExpressionAttributeNames`, or undefined when nothing was compiled */
  get attributeNames(): Record<string, string> | undefined {
    if (this.names.size === 0) return undefined;
    const out: Record<string, string> = {};
    for (const [attribute, placeholder] of this.names) {
      out[placeholder] = attribute;
    }
    return out;
  }

  /** `ExpressionAttributeValues`, or undefined when no value was bound */
  get attributeValues(): Record<string, ConditionValue> | undefined {
    return this.valueCount === 0 ? undefined : { ...this.values };
  }

  private join(conditions: Condition[], operator: "AND" | "OR"): string {
    const [only] = conditions;
    if (conditions.length === 1 && only) return this.compile(only);
    return `(${conditions.map((c) => this.compile(c)).join(` ${operator} `)})`;
  }

  private name(attribute: string): string {
    let placeholder = this.names.get(attribute);
    if (!placeholder) {
      placeholder = `#n${this.names.size}`;
      this.names.set(attribute, placeholder);
    }
    return placeholder;
  }

  private value(value: ConditionValue): string {
    const placeholder = `:v${this.valueCount++}`;
    this.values[placeholder] = value;
    return placeholder;
  }
}
