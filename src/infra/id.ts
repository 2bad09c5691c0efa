import { randomUUID } from "node:crypto";

/**
 * Generate a short unique identifier.
 *
 * Takes the first 64 bits of a UUID v4 and returns them as a 16-char hex string.
 * Example: "f84c87422db644fd"
 */
export function shortId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 16);
}
