/**
 * Reconstructor: rebuilds the target value from flat front-end output.
 *
 * Leaves convert their tokens (or fall back to their default), groups
 * assemble their children through the record's schema, and choices follow
 * the selected (or default) variant. Every key read is recorded so callers
 * can verify nothing the front end produced went unused.
 */

import {
  ABSENT,
  ConversionError,
  InstantiationError,
  InternalInconsistencyError,
  MissingRequiredArgumentError,
} from "@shapeargs/sdk";
import type {
  ChoiceNode,
  FlatValues,
  GroupNode,
  InputError,
  LeafNode,
  ParserNode,
} from "@shapeargs/sdk";
import { createLogger, formatChoices } from "@shapeargs/shared";

const logger = createLogger("Reconstructor");

export type ReconstructResult =
  | { readonly ok: true; readonly value: unknown; readonly consumed: ReadonlySet<string> }
  | { readonly ok: false; readonly error: InputError };

/** A missing optional field leaves its key out of the parent record. */
const OMIT: unique symbol = Symbol("shapeargs.omit");

type Step = { ok: true; value: unknown } | { ok: false; error: InputError };

function leafArgumentName(node: LeafNode): string {
  const argument = node.argument;
  if (!argument) return node.field.key;
  return argument.flag !== undefined ? `--${argument.flag}` : argument.metavar;
}

function fallback(node: LeafNode): Step {
  const { field } = node;
  switch (field.default.kind) {
    case "value":
      return { ok: true, value: field.default.value };
    case "missing":
      return { ok: true, value: OMIT };
    case "required":
      return { ok: false, error: new MissingRequiredArgumentError(field.key, leafArgumentName(node)) };
  }
}

function visitLeaf(node: LeafNode, flat: FlatValues, consumed: Set<string>): Step {
  const { field, spec } = node;
  const raw = spec ? flat.get(field.key) : undefined;
  if (raw !== undefined) consumed.add(field.key);

  if (raw === undefined || raw === ABSENT || !spec) return fallback(node);

  try {
    const result = spec.instanceFromTokens(raw);
    if (result.ok) return result;
    return { ok: false, error: new ConversionError(field.key, leafArgumentName(node), raw, result.message) };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      error: new ConversionError(field.key, leafArgumentName(node), raw, reason, { cause: err }),
    };
  }
}

function visitGroup(node: GroupNode, flat: FlatValues, consumed: Set<string>): Step {
  const values: Record<string, unknown> = {};
  for (const child of node.children) {
    const step = visitNode(child, flat, consumed);
    if (!step.ok) return step;
    if (step.value !== OMIT) values[child.field.name] = step.value;
  }
  const assembled = node.assemble(values);
  if (assembled.ok) return assembled;
  return {
    ok: false,
    error: new InstantiationError(node.field.key, assembled.message, { cause: assembled.cause }),
  };
}

function visitChoice(node: ChoiceNode, flat: FlatValues, consumed: Set<string>): Step {
  const { field } = node;
  const raw = flat.get(field.key);
  if (raw !== undefined) consumed.add(field.key);

  const selected = raw !== undefined && raw !== ABSENT ? raw[0] : node.defaultVariant;
  const names = [...node.variants.keys()];
  if (selected === undefined) {
    return { ok: false, error: new MissingRequiredArgumentError(field.key, formatChoices(names)) };
  }
  const variant = node.variants.get(selected);
  if (!variant) {
    return {
      ok: false,
      error: new ConversionError(field.key, formatChoices(names), [selected], "unknown subcommand"),
    };
  }
  return visitNode(variant, flat, consumed);
}

function visitNode(node: ParserNode, flat: FlatValues, consumed: Set<string>): Step {
  switch (node.kind) {
    case "leaf":
      return visitLeaf(node, flat, consumed);
    case "group":
      return visitGroup(node, flat, consumed);
    case "choice":
      return visitChoice(node, flat, consumed);
  }
}

/** Rebuild the value of `node`. Keys the subtree never reads are left alone. */
export function reconstruct(node: ParserNode, flat: FlatValues): ReconstructResult {
  const consumed = new Set<string>();
  const step = visitNode(node, flat, consumed);
  if (!step.ok) {
    logger.debug("Reconstruction failed", { path: step.error.path, code: step.error.code });
    return step;
  }
  return { ok: true, value: step.value === OMIT ? undefined : step.value, consumed };
}

/**
 * Rebuild the whole tree and check that every key present in `flat` was
 * read by some node.
 *
 * @throws InternalInconsistencyError when keys are left over
 */
export function reconstructAll(root: GroupNode, flat: FlatValues): ReconstructResult {
  const result = reconstruct(root, flat);
  if (!result.ok) return result;
  const leftover = [...flat.keys()].filter((key) => !result.consumed.has(key));
  if (leftover.length > 0) throw new InternalInconsistencyError(leftover);
  return result;
}
