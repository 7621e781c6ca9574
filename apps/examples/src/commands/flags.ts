/**
 * Flags command - booleans given as True/False and booleans as switches.
 *
 * Usage:
 *   shapeargs-examples flags --boolean True
 *   shapeargs-examples flags --boolean False --flag-a
 *   shapeargs-examples flags --boolean False --no-flag-b
 */

import { z } from "zod";
import { parseCli } from "@shapeargs/core";
import { PROGRAM, report, type ExampleCommand } from "./base.js";

export const FlagsArgs = z.object({
  boolean: z.boolean().describe("Takes an explicit True or False."),
  optional_boolean: z.boolean().optional().describe("Like --boolean, but may be left out."),
  flag_a: z.boolean().default(false).describe("--flag-a sets this to True."),
  flag_b: z.boolean().default(true).describe("--no-flag-b sets this to False."),
});

export class FlagsCommand implements ExampleCommand {
  name = "flags";
  description = "Booleans as explicit values and as --flag/--no-flag switches";

  async execute(argv: string[]): Promise<number> {
    const outcome = parseCli(FlagsArgs, {
      prog: `${PROGRAM} ${this.name}`,
      description: this.description,
      args: argv,
    });
    return report(outcome, (args) => JSON.stringify(args));
  }
}
