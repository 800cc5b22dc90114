import { randomUUID } from "node:crypto";

/**
 * Generate a unique id, optionally namespaced (`createId("req")` gives `req_<uuid>`).
 */
export function createId(prefix?: string): string {
  const id = randomUUID();
  return prefix ? `${prefix}_${id}` : id;
}
