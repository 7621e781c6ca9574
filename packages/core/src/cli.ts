/**
 * Top-level entry points.
 *
 * `parseCli` runs the whole pipeline (resolve, build, parse argv,
 * reconstruct) and reports the outcome as data. `cli` does the same and
 * handles help and input errors the way a program's main should: print and
 * exit.
 */

import { basename } from "node:path";
import type { z } from "zod";
import { ConfigError } from "@shapeargs/sdk";
import type { InputError } from "@shapeargs/sdk";
import { CliOptionsSchema, createLogger, validateInput } from "@shapeargs/shared";
import { reconstructAll } from "./calling/index.js";
import { isCommandTarget, type CommandTarget } from "./command.js";
import { formatHelp, formatUsage, parseArgv } from "./frontend/index.js";
import { createConstructorRegistry, type ConstructorRegistry } from "./registry/index.js";
import { buildParserTree, describeParserLevel } from "./schema/index.js";

const logger = createLogger("Cli");

export interface CliOptions<T = unknown> {
  /** Program name for usage lines; defaults to the running script's file name. */
  prog?: string;
  description?: string;
  /** Defaults to `process.argv.slice(2)`. */
  args?: readonly string[];
  /** Instance whose values replace the schema's defaults. */
  default?: T;
  registry?: ConstructorRegistry;
}

export type CliOutcome<T> =
  | { kind: "value"; value: T }
  | { kind: "help"; text: string }
  | { kind: "error"; error: InputError; usage: string };

type Target = z.ZodTypeAny | CommandTarget;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function execute(target: Target, options: CliOptions): CliOutcome<unknown> {
  const validation = validateInput(CliOptionsSchema, options);
  if (!validation.success) {
    throw new ConfigError(`Invalid cli() options: ${validation.error ?? "unknown problem"}`);
  }

  const prog = options.prog ?? basename(process.argv[1] ?? "cli");
  logger.setContext({ prog });

  const command = isCommandTarget(target) ? target : undefined;
  const schema = isCommandTarget(target) ? target.parameters : target;

  const stop = logger.time("derive");
  const root = buildParserTree(schema, {
    registry: options.registry ?? createConstructorRegistry(),
    defaultInstance: options.default !== undefined ? { value: options.default } : undefined,
  });
  const level = describeParserLevel(root, options.description ?? command?.description);
  stop();

  const parsed = parseArgv(level, options.args ?? process.argv.slice(2));
  if (parsed.kind === "help") {
    return { kind: "help", text: formatHelp(prog, parsed.level, parsed.subcommands) };
  }
  const usage = formatUsage(prog, parsed.level, parsed.subcommands);
  if (parsed.kind === "error") {
    logger.debug("Rejected command line", { path: parsed.error.path, code: parsed.error.code });
    return { kind: "error", error: parsed.error, usage };
  }

  const result = reconstructAll(root, parsed.values);
  if (!result.ok) return { kind: "error", error: result.error, usage };
  if (!command) return { kind: "value", value: result.value };

  if (!isRecord(result.value)) {
    throw new ConfigError("Command parameters must build to an object; check transforms on the parameters schema");
  }
  return { kind: "value", value: command.run(result.value) };
}

/**
 * Parse a command line into a value without printing or exiting.
 *
 * @throws StructuralError subclasses when the target cannot become a CLI
 */
export function parseCli<S extends z.ZodTypeAny>(target: S, options?: CliOptions<z.input<S>>): CliOutcome<z.output<S>>;
export function parseCli<P extends z.AnyZodObject, R>(
  target: CommandTarget<P, R>,
  options?: CliOptions<z.input<P>>,
): CliOutcome<R>;
export function parseCli(target: Target, options: CliOptions = {}): CliOutcome<unknown> {
  return execute(target, options);
}

/**
 * Parse a command line and return the rebuilt value, or `run`'s result for a
 * command. `--help` prints help and exits 0; bad input prints the usage line
 * and the error to stderr and exits 2.
 *
 * @example
 * ```typescript
 * const Args = z.object({ name: z.string(), loud: z.boolean().default(false) });
 * const { name, loud } = cli(Args, { description: "Say hello." });
 * ```
 */
export function cli<S extends z.ZodTypeAny>(target: S, options?: CliOptions<z.input<S>>): z.output<S>;
export function cli<P extends z.AnyZodObject, R>(target: CommandTarget<P, R>, options?: CliOptions<z.input<P>>): R;
export function cli(target: Target, options: CliOptions = {}): unknown {
  const outcome = execute(target, options);
  switch (outcome.kind) {
    case "value":
      return outcome.value;
    case "help":
      console.log(outcome.text);
      return process.exit(0);
    case "error":
      console.error(outcome.usage);
      console.error("");
      console.error(`error: ${outcome.error.message}`);
      return process.exit(2);
  }
}
