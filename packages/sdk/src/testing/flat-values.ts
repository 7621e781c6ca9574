/**
 * Helpers for building front-end output by hand in reconstructor tests.
 */

import { ABSENT, type FlatValues, type RawValue } from "../index.js";

/**
 * Build FlatValues from a plain record. A string becomes a one-token list,
 * `null` becomes ABSENT.
 *
 * @example
 * ```typescript
 * import { createFlatValues } from "@shapeargs/sdk/testing";
 *
 * const flat = createFlatValues({ lr: "0.1", layers: ["2", "3"], name: null });
 * ```
 */
export function createFlatValues(
  entries: Record<string, string | readonly string[] | null>,
): FlatValues {
  const values = new Map<string, RawValue>();
  for (const [key, entry] of Object.entries(entries)) {
    if (entry === null) {
      values.set(key, ABSENT);
    } else if (typeof entry === "string") {
      values.set(key, [entry]);
    } else {
      values.set(key, entry);
    }
  }
  return values;
}

/** Keys of `flat` that hold tokens, in insertion order. */
export function presentKeys(flat: FlatValues): string[] {
  const keys: string[] = [];
  for (const [key, value] of flat) {
    if (value !== ABSENT) keys.push(key);
  }
  return keys;
}
