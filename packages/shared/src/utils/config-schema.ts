/**
 * Zod schema for the options object accepted by cli().
 *
 * Catches misspelled or mistyped options before any derivation work starts.
 */

import { z } from "zod";

const RegistrySchema = z.custom<object>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "lookup" in value &&
    typeof value.lookup === "function",
  { message: "registry must be created with createConstructorRegistry()" },
);

export const CliOptionsSchema = z
  .object({
    prog: z.string().min(1, "prog must not be empty").optional(),
    description: z.string().optional(),
    args: z.array(z.string()).optional(),
    default: z.unknown().optional(),
    registry: RegistrySchema.optional(),
  })
  .strict();
