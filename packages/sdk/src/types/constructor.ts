/**
 * Constructor specs: how a leaf turns raw tokens into a value and back.
 */

import type { FieldMarkers, TypeDescriptor } from "./descriptor.js";

/** Token count a leaf consumes: a fixed count, zero or more, or one or more. */
export type Nargs = number | "*" | "+";

export type ConversionResult<T = unknown> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly message: string };

export function converted<T>(value: T): ConversionResult<T> {
  return { ok: true, value };
}

export function conversionFailed(message: string): ConversionResult<never> {
  return { ok: false, message };
}

/**
 * Parsing/formatting rule for one leaf.
 *
 * For any `v` with `accepts(v)`, `instanceFromTokens(tokensFromInstance(v))`
 * must give back a value equal to `v`; help output relies on it to show
 * defaults.
 */
export interface ConstructorSpec<T = unknown> {
  nargs: Nargs;
  metavar: string;
  /** Closed set of accepted tokens, when there is one. */
  choices?: readonly string[];
  instanceFromTokens(tokens: readonly string[]): ConversionResult<T>;
  tokensFromInstance(value: T): string[];
  accepts(value: unknown): boolean;
}

/** What a registry rule gets to look at. */
export interface PrimitiveTypeInfo {
  readonly descriptor: TypeDescriptor;
  readonly markers: FieldMarkers;
}

/**
 * Looks up the spec for a nested type position through the same registry.
 * Throws NoMatchingRuleError when nothing matches.
 */
export type SpecLookup = (descriptor: TypeDescriptor) => ConstructorSpec;

/** Returns a spec when the rule applies to `info`, undefined otherwise. */
export type PrimitiveRule = (info: PrimitiveTypeInfo, lookup: SpecLookup) => ConstructorSpec | undefined;
