/**
 * Schema annotations.
 *
 * Markers attach to a schema instance, the same way zod's own `.describe()`
 * travels with an instance: annotate the exact schema you place in a shape,
 * and create a fresh schema per field rather than sharing one annotated
 * instance between fields that should differ.
 */

import { z } from "zod";
import type { ConstructorSpec, FieldMarkers, SubcommandMarker } from "@shapeargs/sdk";

export interface TypeVarInfo {
  name: string;
  /** Used when no enclosing `bindTypeVars` binds the variable. */
  default?: z.ZodTypeAny;
}

export type TypeBindings = Readonly<Record<string, z.ZodTypeAny>>;

export interface SchemaAnnotations {
  markers: FieldMarkers;
  typeVar?: TypeVarInfo;
  bindings?: TypeBindings;
}

const annotations = new WeakMap<z.ZodTypeAny, SchemaAnnotations>();

export function getAnnotations(schema: z.ZodTypeAny): SchemaAnnotations | undefined {
  return annotations.get(schema);
}

function update<S extends z.ZodTypeAny>(schema: S, patch: Partial<SchemaAnnotations>): S {
  const existing = annotations.get(schema);
  annotations.set(schema, {
    ...existing,
    ...patch,
    markers: { ...existing?.markers, ...patch.markers },
  });
  return schema;
}

/** Attach any set of markers. The helpers below are shorthands for this. */
export function annotate<S extends z.ZodTypeAny>(schema: S, markers: FieldMarkers): S {
  return update(schema, { markers });
}

export interface ArgOptions {
  /** Replaces the field's segment in its flag and path. */
  name?: string;
  help?: string;
  metavar?: string;
  constructorSpec?: ConstructorSpec;
}

export function arg<S extends z.ZodTypeAny>(schema: S, options: ArgOptions): S {
  return annotate(schema, options);
}

/** Read the field from positional tokens instead of a `--flag`. */
export function positional<S extends z.ZodTypeAny>(schema: S): S {
  return annotate(schema, { positional: true });
}

/** Keep the field at its default; it cannot be set from the command line. */
export function fixed<S extends z.ZodTypeAny>(schema: S): S {
  return annotate(schema, { fixed: true });
}

/** Like `fixed`, and also left out of help output. */
export function suppress<S extends z.ZodTypeAny>(schema: S): S {
  return annotate(schema, { suppress: true });
}

/** Keep a defaulted boolean as `--x {True,False}` instead of `--x/--no-x`. */
export function flagConversionOff<S extends z.ZodTypeAny>(schema: S): S {
  return annotate(schema, { flagConversionOff: true });
}

/** Nested record whose fields are flagged without this field's prefix. */
export function omitPrefix<S extends z.ZodTypeAny>(schema: S): S {
  return annotate(schema, { omitPrefix: true });
}

/** Class-level constant: excluded from the CLI and never passed on. */
export function classVar<S extends z.ZodTypeAny>(schema: S): S {
  return annotate(schema, { classVar: true });
}

/** A defaulted union of records becomes its default variant, without subcommands. */
export function avoidSubcommands<S extends z.ZodTypeAny>(schema: S): S {
  return annotate(schema, { avoidSubcommands: true });
}

/**
 * Name a union variant, or give a union field a default variant.
 *
 * @example
 * ```typescript
 * const Optimizer = z.union([
 *   subcommand(z.object({ lr: z.number() }), { name: "sgd" }),
 *   subcommand(z.object({ lr: z.number(), beta: z.number() }), { name: "adam" }),
 * ]);
 * ```
 */
export function subcommand<S extends z.ZodTypeAny>(schema: S, options: SubcommandMarker): S {
  return annotate(schema, { subcommand: options });
}

/**
 * Placeholder for a generic position. Resolved through the bindings of an
 * enclosing `bindTypeVars`, else `options.default`, else the type of the
 * field's default value.
 */
export function typeVar(name: string, options: { default?: z.ZodTypeAny } = {}): z.ZodUnknown {
  return update(z.unknown(), { typeVar: { name, default: options.default } });
}

/**
 * Instantiate a generic schema: `bindTypeVars(Box, { T: z.number() })`.
 * Returns a lazy wrapper so the original schema stays reusable with other
 * bindings.
 */
export function bindTypeVars<S extends z.ZodTypeAny>(schema: S, bindings: TypeBindings): z.ZodLazy<S> {
  return update(
    z.lazy(() => schema),
    { bindings },
  );
}
