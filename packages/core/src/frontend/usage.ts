/**
 * Usage line and help text for one parser scope.
 */

import type { ChoiceArgument, LeafArgument, ParserLevel } from "@shapeargs/sdk";
import { displayToken, formatChoices } from "@shapeargs/shared";

function bracket(required: boolean, text: string): string {
  return required ? text : `[${text}]`;
}

function valueUsage(leaf: LeafArgument): string {
  const metavar = leaf.metavar;
  if (leaf.nargs === "*") return `[${metavar} ...]`;
  if (leaf.nargs === "+") return `${metavar} [${metavar} ...]`;
  return metavar;
}

function optionUsage(leaf: LeafArgument): string {
  if (leaf.booleanFlag) return `--${leaf.flag} | --no-${leaf.flag}`;
  return `--${leaf.flag} ${valueUsage(leaf)}`;
}

function choiceUsage(choice: ChoiceArgument): string {
  return formatChoices(choice.variants.map((variant) => variant.name));
}

/** `usage: prog [-h] --lr FLOAT [--layers [INT ...]] {sgd,adam}` */
export function formatUsage(prog: string, level: ParserLevel, subcommands: readonly string[] = []): string {
  const parts = ["usage:", [prog, ...subcommands].join(" "), "[-h]"];
  for (const leaf of level.leaves) {
    if (!leaf.positional) parts.push(bracket(leaf.required, optionUsage(leaf)));
  }
  for (const leaf of level.leaves) {
    if (leaf.positional) parts.push(bracket(leaf.required, valueUsage(leaf)));
  }
  for (const choice of level.choices) {
    parts.push(bracket(choice.required, choiceUsage(choice)));
  }
  return parts.join(" ");
}

function annotations(help: string | undefined, required: boolean, defaultText: string | undefined): string {
  const notes: string[] = [];
  if (help) notes.push(help);
  if (required) {
    notes.push("(required)");
  } else if (defaultText !== undefined) {
    notes.push(`(default: ${defaultText})`);
  }
  return notes.length > 0 ? `  ${notes.join(" ")}` : "";
}

function shownDefault(tokens: readonly string[] | undefined): string | undefined {
  if (!tokens) return undefined;
  return tokens.length === 0 ? "[]" : tokens.map(displayToken).join(" ");
}

function leafLine(leaf: LeafArgument, label: string): string {
  return `  ${label}${annotations(leaf.help, leaf.required, shownDefault(leaf.defaultDisplay))}`;
}

export function formatHelp(prog: string, level: ParserLevel, subcommands: readonly string[] = []): string {
  const lines = [formatUsage(prog, level, subcommands)];
  if (level.description) lines.push("", level.description);

  const positionals = level.leaves.filter((leaf) => leaf.positional);
  if (positionals.length > 0) {
    lines.push("", "positional arguments:");
    for (const leaf of positionals) lines.push(leafLine(leaf, valueUsage(leaf)));
  }

  lines.push("", "options:", "  -h, --help  show this help message and exit");
  for (const leaf of level.leaves) {
    if (!leaf.positional) lines.push(leafLine(leaf, optionUsage(leaf)));
  }

  for (const choice of level.choices) {
    lines.push("", "subcommands:");
    lines.push(`  ${choiceUsage(choice)}${annotations(choice.help, choice.required, choice.defaultVariant)}`);
    for (const variant of choice.variants) {
      lines.push(`    ${variant.name}${variant.help ? `  ${variant.help}` : ""}`);
    }
  }

  return lines.join("\n");
}
