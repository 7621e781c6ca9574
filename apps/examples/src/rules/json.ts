/**
 * Constructor rule for string-keyed records of unknown values, given as one JSON token.
 */

import { conversionFailed, converted } from "@shapeargs/sdk";
import type { ConstructorSpec, PrimitiveRule } from "@shapeargs/sdk";

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export const jsonObjectSpec: ConstructorSpec = {
  nargs: 1,
  metavar: "JSON",
  instanceFromTokens(tokens) {
    try {
      const parsed: unknown = JSON.parse(tokens[0]);
      return isJsonObject(parsed) ? converted(parsed) : conversionFailed("expected a JSON object");
    } catch (err) {
      return conversionFailed(err instanceof Error ? err.message : String(err));
    }
  },
  tokensFromInstance: (value) => [JSON.stringify(value)],
  accepts: isJsonObject,
};

export const jsonObjectRule: PrimitiveRule = ({ descriptor }) =>
  descriptor.kind === "mapping" && descriptor.value.kind === "primitive" && descriptor.value.name === "unknown"
    ? jsonObjectSpec
    : undefined;
