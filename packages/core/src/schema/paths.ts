/**
 * Path rendering for tree keys, flags and subcommand tokens.
 *
 * Field segments are joined with ".", a variant segment is appended as
 * ":name". Unnamed positions (the "" wrapper around a non-record target)
 * leave no trace in any rendering.
 */

import type { PathSegment } from "@shapeargs/sdk";
import { hyphenate } from "@shapeargs/shared";

export function fieldSegment(name: string): PathSegment {
  return { kind: "field", name };
}

export function variantSegment(name: string): PathSegment {
  return { kind: "variant", name: hyphenate(name) };
}

function render(path: readonly PathSegment[], fieldName: (name: string) => string): string {
  let out = "";
  for (const segment of path) {
    if (segment.name === "") continue;
    if (segment.kind === "variant") {
      out += `:${segment.name}`;
    } else {
      out += out === "" ? fieldName(segment.name) : `.${fieldName(segment.name)}`;
    }
  }
  return out;
}

/** Tree-unique key, e.g. `optimizer:adam.lr`. */
export function renderKey(path: readonly PathSegment[]): string {
  return render(path, (name) => name);
}

/** Flag name without dashes, e.g. `model.learning-rate`. */
export function renderFlag(names: readonly string[]): string {
  return names
    .filter((name) => name !== "")
    .map(hyphenate)
    .join(".");
}

/** Token selecting a variant, e.g. `optimizer:adam`, or `adam` at the top level. */
export function renderSubcommand(path: readonly PathSegment[]): string {
  const rendered = render(path, hyphenate);
  return rendered.startsWith(":") ? rendered.slice(1) : rendered;
}
