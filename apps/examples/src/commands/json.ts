/**
 * Json command - a custom constructor rule for free-form settings.
 *
 * Usage:
 *   shapeargs-examples json --config '{"lr": 0.1}'
 */

import { z } from "zod";
import { createConstructorRegistry, parseCli } from "@shapeargs/core";
import { PROGRAM, report, type ExampleCommand } from "./base.js";
import { jsonObjectRule } from "../rules/json.js";

export const JsonArgs = z.object({
  config: z.record(z.string(), z.unknown()).describe("Settings as one JSON object."),
  overrides: z.record(z.string(), z.unknown()).default({}),
});

export class JsonCommand implements ExampleCommand {
  name = "json";
  description = "Settings passed as JSON through a registered constructor rule";

  async execute(argv: string[]): Promise<number> {
    const registry = createConstructorRegistry();
    const outcome = registry.scope(() => {
      registry.primitiveRule(jsonObjectRule);
      return parseCli(JsonArgs, { prog: `${PROGRAM} ${this.name}`, args: argv, registry });
    });
    return report(outcome, (args) => JSON.stringify(args));
  }
}
