/**
 * Front-end argv parser.
 *
 * Hand-rolled, driven entirely by ParserLevel descriptions. Supported forms:
 *   - Value option: --lr 0.1, --lr=0.1, --layers 2 3 4
 *   - Switch: --verbose / --no-verbose
 *   - Positionals, filled in declaration order
 *   - Subcommands: the first token that is not an option once positionals
 *     are filled; the chosen variant's arguments become the new scope, and
 *     sibling choices not yet given follow it
 *   - "--" ends option parsing; -h/--help asks for help on the current scope
 *
 * A repeated option keeps its last occurrence. Every leaf of every scope
 * entered is reported, as ABSENT when no tokens were given.
 */

import { ABSENT, ArgumentSyntaxError } from "@shapeargs/sdk";
import type { FlatValues, LeafArgument, Nargs, ParserLevel, RawValue } from "@shapeargs/sdk";
import { formatChoices } from "@shapeargs/shared";

export interface FrontEndState {
  /** Scope the parser ended in. */
  level: ParserLevel;
  /** Subcommand tokens taken, outermost first. */
  subcommands: readonly string[];
}

export type FrontEndResult =
  | ({ kind: "values"; values: FlatValues } & FrontEndState)
  | ({ kind: "help" } & FrontEndState)
  | ({ kind: "error"; error: ArgumentSyntaxError } & FrontEndState);

interface OptionMatch {
  leaf: LeafArgument;
  negated: boolean;
}

function isOptionToken(token: string): boolean {
  return token.startsWith("--") && token.length > 2;
}

function indexOptions(level: ParserLevel): Map<string, OptionMatch> {
  const options = new Map<string, OptionMatch>();
  for (const leaf of level.leaves) {
    if (leaf.flag === undefined) continue;
    options.set(`--${leaf.flag}`, { leaf, negated: false });
    if (leaf.booleanFlag) options.set(`--no-${leaf.flag}`, { leaf, negated: true });
  }
  return options;
}

function markAbsent(values: Map<string, RawValue>, level: ParserLevel): void {
  for (const { key } of [...level.leaves, ...level.choices]) {
    if (!values.has(key)) values.set(key, ABSENT);
  }
}

/**
 * Collect tokens for one argument starting at `start`. Variable counts stop
 * at the next option, at "--", and at any of `stopTokens`.
 */
function takeTokens(
  argv: readonly string[],
  start: number,
  nargs: Nargs,
  stopAtOptions: boolean,
  stopTokens: ReadonlySet<string> = new Set(),
): { tokens: string[]; next: number } {
  const limit = typeof nargs === "number" ? nargs : Infinity;
  const tokens: string[] = [];
  let next = start;
  while (next < argv.length && tokens.length < limit) {
    const token = argv[next];
    if (stopAtOptions && (token === "--" || token === "-h" || isOptionToken(token))) break;
    if (typeof nargs !== "number" && stopTokens.has(token)) break;
    tokens.push(token);
    next++;
  }
  return { tokens, next };
}

function countProblem(name: string, nargs: Nargs, count: number): string | undefined {
  if (typeof nargs === "number" && count !== nargs) {
    return `argument ${name}: expected ${nargs} argument${nargs === 1 ? "" : "s"}`;
  }
  if (nargs === "+" && count === 0) return `argument ${name}: expected at least one argument`;
  return undefined;
}

export function parseArgv(root: ParserLevel, argv: readonly string[]): FrontEndResult {
  const values = new Map<string, RawValue>();
  const subcommands: string[] = [];
  let level = root;
  let options = indexOptions(level);
  let positionals = level.leaves.filter((leaf) => leaf.positional);
  let nextPositional = 0;
  let optionsEnded = false;
  markAbsent(values, level);

  const fail = (message: string, path = ""): FrontEndResult => ({
    kind: "error",
    error: new ArgumentSyntaxError(message, path),
    level,
    subcommands,
  });

  let i = 0;
  while (i < argv.length) {
    const token = argv[i];

    if (!optionsEnded) {
      if (token === "--") {
        optionsEnded = true;
        i++;
        continue;
      }
      if (token === "-h" || token === "--help") return { kind: "help", level, subcommands };
      if (isOptionToken(token)) {
        const eq = token.indexOf("=");
        const name = eq < 0 ? token : token.slice(0, eq);
        const inline = eq < 0 ? undefined : token.slice(eq + 1);
        const match = options.get(name);
        if (!match) return fail(`unrecognized arguments: ${token}`);

        const { leaf, negated } = match;
        if (leaf.booleanFlag) {
          if (inline !== undefined) return fail(`argument ${name}: ignored explicit argument '${inline}'`, leaf.key);
          values.set(leaf.key, [negated ? "False" : "True"]);
          i++;
          continue;
        }

        const taken =
          inline === undefined ? takeTokens(argv, i + 1, leaf.nargs, true) : { tokens: [inline], next: i + 1 };
        const problem = countProblem(name, leaf.nargs, taken.tokens.length);
        if (problem) return fail(problem, leaf.key);
        values.set(leaf.key, taken.tokens);
        i = taken.next;
        continue;
      }
    }

    const choice = level.choices[0];
    const subcommandNames = new Set(choice?.variants.map((variant) => variant.name));

    if (nextPositional < positionals.length) {
      const leaf = positionals[nextPositional++];
      const taken = takeTokens(argv, i, leaf.nargs, !optionsEnded, subcommandNames);
      if (taken.tokens.length > 0) {
        const problem = countProblem(leaf.metavar, leaf.nargs, taken.tokens.length);
        if (problem) return fail(problem, leaf.key);
        values.set(leaf.key, taken.tokens);
        i = taken.next;
        continue;
      }
    }

    if (choice) {
      const variant = choice.variants.find((candidate) => candidate.name === token);
      if (!variant) {
        const names = choice.variants.map((candidate) => candidate.name);
        return fail(
          `argument ${formatChoices(names)}: invalid choice: '${token}' (choose from ${names.join(", ")})`,
          choice.key,
        );
      }
      values.set(choice.key, [token]);
      subcommands.push(token);
      markAbsent(values, variant.level);
      level = {
        leaves: variant.level.leaves,
        choices: [...variant.level.choices, ...level.choices.slice(1)],
        description: variant.level.description,
      };
      options = indexOptions(level);
      positionals = level.leaves.filter((leaf) => leaf.positional);
      nextPositional = 0;
      i++;
      continue;
    }

    return fail(`unrecognized arguments: ${argv.slice(i).join(" ")}`);
  }

  return { kind: "values", values, level, subcommands };
}
