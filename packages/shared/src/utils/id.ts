import { randomUUID } from "node:crypto";

/**
 * Generate a unique ID, optionally namespaced (`conn-<uuid>`).
 */
export function createId(prefix?: string): string {
  const id = randomUUID();
  return prefix ? `${prefix}-${id}` : id;
}
