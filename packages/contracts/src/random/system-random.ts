import { getRandomValues } from "node:crypto";

/**
 * Unsigned 32-bit integer for seeding a fresh generation.
 */
export function randomUint32(): number {
  const [value = 0] = getRandomValues(new Uint32Array(1));
  return value >>> 0;
}
