/**
 * Parser tree nodes and the boundary with the front-end parser.
 */

import type { ConstructorSpec, Nargs } from "./constructor.js";
import type { FieldSpec } from "./descriptor.js";

/** Marks a leaf the front end saw no tokens for. */
export const ABSENT: unique symbol = Symbol("shapeargs.absent");

export type RawValue = readonly string[] | typeof ABSENT;

/** key → raw tokens; choice keys map to `[subcommand]`. */
export type FlatValues = ReadonlyMap<string, RawValue>;

// --- Front-end boundary ---

export interface LeafArgument {
  key: string;
  /** `--name` without dashes; undefined for positionals. */
  flag?: string;
  positional: boolean;
  nargs: Nargs;
  metavar: string;
  choices?: readonly string[];
  required: boolean;
  defaultDisplay?: readonly string[];
  help?: string;
  /** `--name` / `--no-name` switch instead of a value option. */
  booleanFlag: boolean;
}

export interface ChoiceVariantArgument {
  /** Subcommand token. */
  name: string;
  help?: string;
  level: ParserLevel;
}

export interface ChoiceArgument {
  key: string;
  required: boolean;
  defaultVariant?: string;
  help?: string;
  variants: readonly ChoiceVariantArgument[];
}

/** Everything one argv scope accepts before a subcommand switches scope. */
export interface ParserLevel {
  leaves: readonly LeafArgument[];
  choices: readonly ChoiceArgument[];
  description?: string;
}

// --- Tree ---

export type AssemblyResult =
  | { readonly ok: true; readonly value: unknown }
  | {
      readonly ok: false;
      readonly message: string;
      readonly cause?: unknown;
    };

export interface LeafNode {
  readonly kind: "leaf";
  readonly field: FieldSpec;
  /** Absent for fixed leaves, which never read tokens. */
  readonly spec?: ConstructorSpec;
  /** Absent for fixed and suppressed leaves, which are not exposed. */
  readonly argument?: LeafArgument;
}

export interface GroupNode {
  readonly kind: "group";
  readonly field: FieldSpec;
  readonly children: readonly ParserNode[];
  assemble(values: Record<string, unknown>): AssemblyResult;
}

export interface ChoiceNode {
  readonly kind: "choice";
  readonly field: FieldSpec;
  /** Keyed by subcommand token. */
  readonly variants: ReadonlyMap<string, ParserNode>;
  readonly defaultVariant?: string;
  readonly argument: ChoiceArgument;
}

export type ParserNode = LeafNode | GroupNode | ChoiceNode;
