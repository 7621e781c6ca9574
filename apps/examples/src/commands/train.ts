/**
 * Train command - nested records, a chosen optimizer and an optional checkpoint.
 *
 * Usage:
 *   shapeargs-examples train data.csv --epochs 3
 *   shapeargs-examples train data.csv optimizer:sgd --optimizer.momentum 0.5
 *   shapeargs-examples train data.csv optimizer:adam checkpoint:checkpoint --checkpoint.dir runs
 */

import { z } from "zod";
import { conf, defineCommand, parseCli } from "@shapeargs/core";
import { PROGRAM, report, type ExampleCommand } from "./base.js";

const Adam = z
  .object({
    kind: z.literal("adam"),
    learning_rate: z.number().default(0.001),
    betas: z.tuple([z.number(), z.number()]).default([0.9, 0.999]),
  })
  .describe("Adam with bias-corrected moment estimates.");

const Sgd = z
  .object({
    kind: z.literal("sgd"),
    learning_rate: z.number().default(0.01),
    momentum: z.number().default(0.9),
  })
  .describe("Plain stochastic gradient descent.");

export const TrainParameters = z.object({
  dataset: conf.positional(z.string().describe("Path to the training data.")),
  epochs: z.number().int().positive().default(10),
  seed: z.number().int().default(0),
  layers: z.array(z.number().int()).default([64, 64]).describe("Hidden layer widths."),
  optimizer: z
    .discriminatedUnion("kind", [Adam, Sgd])
    .default({ kind: "adam", learning_rate: 0.001, betas: [0.9, 0.999] }),
  checkpoint: z
    .object({
      dir: z.string(),
      every: z.number().int().positive().default(1),
    })
    .optional(),
});

export type TrainParameters = z.output<typeof TrainParameters>;

export const train = defineCommand({
  description: "Resolve a training configuration and print it.",
  parameters: TrainParameters,
  run: (params: TrainParameters) => JSON.stringify(params),
});

export class TrainCommand implements ExampleCommand {
  name = "train";
  description = "Nested records, an optimizer subcommand and an optional checkpoint";

  async execute(argv: string[]): Promise<number> {
    const outcome = parseCli(train, { prog: `${PROGRAM} ${this.name}`, args: argv });
    return report(outcome, (summary) => summary);
  }
}
