/**
 * ID helpers.
 */

import { randomUUID } from "node:crypto";

const MONKEY_ID_PREFIX = "monkey_";

/**
 * Generate a short monkey id: the prefix plus 8 hex characters of a UUID.
 */
export function generateMonkeyId(): string {
  return `${MONKEY_ID_PREFIX}${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}
