/**
 * Command targets: a parameter record plus the function it feeds.
 */

import type { z } from "zod";

export interface CommandTarget<P extends z.AnyZodObject = z.AnyZodObject, R = unknown> {
  readonly kind: "command";
  readonly parameters: P;
  readonly description?: string;
  run(params: z.output<P>): R;
}

export interface CommandDefinition<P extends z.AnyZodObject, R> {
  parameters: P;
  description?: string;
  run(params: z.output<P>): R;
}

/**
 * Describe a callable by its parameter record.
 *
 * @example
 * ```typescript
 * const train = defineCommand({
 *   description: "Train a model.",
 *   parameters: z.object({ lr: z.number().default(0.01), epochs: z.number().int() }),
 *   run: ({ lr, epochs }) => `${epochs} epochs at ${lr}`,
 * });
 * cli(train, { args: ["--epochs", "3"] });
 * ```
 */
export function defineCommand<P extends z.AnyZodObject, R>(definition: CommandDefinition<P, R>): CommandTarget<P, R> {
  return {
    kind: "command",
    parameters: definition.parameters,
    description: definition.description,
    run: (params) => definition.run(params),
  };
}

export function isCommandTarget(value: unknown): value is CommandTarget {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "command";
}
