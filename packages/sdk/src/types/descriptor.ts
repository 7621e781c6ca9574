/**
 * Canonical type descriptors produced by the resolver.
 *
 * A descriptor holds no functions of its own. Primitive and struct descriptors
 * keep a reference to the zod schema they came from, which is shared, so
 * resolving the same schema twice yields structurally equal trees.
 */

import type { z } from "zod";
import type { ConstructorSpec } from "./constructor.js";

export type PrimitiveName =
  | "string"
  | "number"
  | "integer"
  | "bigint"
  | "boolean"
  | "date"
  | "unknown"
  | "opaque";

export type LiteralValue = string | number | bigint | boolean | null | undefined;

export interface LiteralOption {
  /** Token shown to and typed by the user. */
  label: string;
  value: LiteralValue;
}

export interface PrimitiveDescriptor {
  readonly kind: "primitive";
  readonly name: PrimitiveName;
  /** zod type name of the position, e.g. "ZodString" or "ZodFunction". */
  readonly typeName: string;
  readonly schema: z.ZodTypeAny;
}

export interface OptionalDescriptor {
  readonly kind: "optional";
  readonly inner: TypeDescriptor;
  /** Value standing for "not supplied": undefined for `.optional()`, null for `.nullable()`. */
  readonly absent: null | undefined;
}

export interface SequenceDescriptor {
  readonly kind: "sequence";
  readonly element: TypeDescriptor;
  readonly container: "array" | "set";
  readonly minLength: number;
}

export interface TupleDescriptor {
  readonly kind: "tuple";
  readonly elements: readonly TypeDescriptor[];
  readonly rest?: TypeDescriptor;
}

export interface MappingDescriptor {
  readonly kind: "mapping";
  readonly key: TypeDescriptor;
  readonly value: TypeDescriptor;
  readonly container: "record" | "map";
}

export interface LiteralDescriptor {
  readonly kind: "literal";
  readonly options: readonly LiteralOption[];
}

export interface StructDescriptor {
  readonly kind: "struct";
  /** Subcommand name taken from a `subcommand` marker, if any. */
  readonly name?: string;
  readonly doc?: string;
  readonly fields: readonly FieldDescriptor[];
  /** Outermost schema at this position (may wrap the object in effects). */
  readonly schema: z.ZodTypeAny;
  readonly objectSchema: z.AnyZodObject;
}

export interface UnionVariant {
  readonly name: string;
  readonly help?: string;
  readonly descriptor: StructDescriptor;
}

/** Union of records, exposed as subcommands. */
export interface UnionDescriptor {
  readonly kind: "union";
  readonly variants: readonly UnionVariant[];
  /** Key of the literal field that tells variants apart, for discriminated unions. */
  readonly discriminator?: string;
}

/** Union whose members are all leaf-shaped; tried in declared order. */
export interface AlternativesDescriptor {
  readonly kind: "alternatives";
  readonly members: readonly TypeDescriptor[];
}

export type TypeDescriptor =
  | PrimitiveDescriptor
  | OptionalDescriptor
  | SequenceDescriptor
  | TupleDescriptor
  | MappingDescriptor
  | LiteralDescriptor
  | StructDescriptor
  | UnionDescriptor
  | AlternativesDescriptor;

export type FieldDefault =
  | { readonly kind: "required" }
  | { readonly kind: "value"; readonly value: unknown }
  | { readonly kind: "missing" };

export const REQUIRED: FieldDefault = { kind: "required" };
export const MISSING: FieldDefault = { kind: "missing" };

export function defaultOf(value: unknown): FieldDefault {
  return { kind: "value", value };
}

/** Subcommand settings attached to a union variant or to a union field. */
export interface SubcommandMarker {
  name?: string;
  help?: string;
  /** Value used when no subcommand is given. */
  default?: unknown;
}

/** Per-field annotations collected from `conf` helpers. */
export interface FieldMarkers {
  name?: string;
  help?: string;
  metavar?: string;
  constructorSpec?: ConstructorSpec;
  positional?: boolean;
  fixed?: boolean;
  suppress?: boolean;
  flagConversionOff?: boolean;
  omitPrefix?: boolean;
  classVar?: boolean;
  avoidSubcommands?: boolean;
  subcommand?: SubcommandMarker;
}

/** One key of an object schema, as seen by the resolver. */
export interface FieldDescriptor {
  readonly name: string;
  readonly descriptor: TypeDescriptor;
  /** Field schema including optional/default/effects wrappers. */
  readonly schema: z.ZodTypeAny;
  readonly default: FieldDefault;
  readonly doc?: string;
  readonly markers: FieldMarkers;
}

export type PathSegment =
  | { readonly kind: "field"; readonly name: string }
  | { readonly kind: "variant"; readonly name: string };

/** A field placed in the parser tree. */
export interface FieldSpec {
  readonly name: string;
  readonly descriptor: TypeDescriptor;
  readonly default: FieldDefault;
  readonly doc?: string;
  readonly path: readonly PathSegment[];
  /** Flattened, tree-unique rendering of `path`. */
  readonly key: string;
  /** Dashed flag name without the leading `--`; empty for unnamed positions. */
  readonly flag: string;
  readonly markers: FieldMarkers;
}

/** Type guard separating descriptors from raw zod schemas. */
export function isTypeDescriptor(value: unknown): value is TypeDescriptor {
  if (typeof value !== "object" || value === null || !("kind" in value)) return false;
  const kind = value.kind;
  return (
    kind === "primitive" ||
    kind === "optional" ||
    kind === "sequence" ||
    kind === "tuple" ||
    kind === "mapping" ||
    kind === "literal" ||
    kind === "struct" ||
    kind === "union" ||
    kind === "alternatives"
  );
}
