/**
 * Error hierarchy.
 *
 * StructuralError subclasses are raised while deriving the parser and mean the
 * schema itself is unusable. InputError subclasses are raised while rebuilding
 * a value and describe a bad command line.
 */

import { ErrorCode } from "./codes.js";

export class ShapeArgsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ShapeArgsError";
  }
}

export class StructuralError extends ShapeArgsError {
  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = "StructuralError";
  }
}

export class InputError extends ShapeArgsError {
  constructor(
    message: string,
    code: string,
    /** Tree key of the offending node ("" for the root). */
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = "InputError";
  }
}

/** Renders a tree key for messages; the root has an empty key. */
function describeWhere(where: string): string {
  return where === "" ? "<root>" : where;
}

// --- Structural ---

export class UnresolvedGenericError extends StructuralError {
  constructor(
    public readonly typeVar: string,
    public readonly where: string,
  ) {
    super(
      `Type variable "${typeVar}" at ${describeWhere(where)} has no binding and no default to infer it from`,
      ErrorCode.UNRESOLVED_GENERIC,
    );
    this.name = "UnresolvedGenericError";
  }
}

export class UnsupportedUnionShapeError extends StructuralError {
  constructor(
    public readonly where: string,
    detail: string,
  ) {
    super(`Unsupported union at ${describeWhere(where)}: ${detail}`, ErrorCode.UNSUPPORTED_UNION_SHAPE);
    this.name = "UnsupportedUnionShapeError";
  }
}

export class CyclicTypeError extends StructuralError {
  constructor(
    public readonly where: string,
    typeDescription: string,
  ) {
    super(
      `Schema ${typeDescription} at ${describeWhere(where)} refers to itself; recursive schemas cannot be expanded into arguments`,
      ErrorCode.CYCLIC_TYPE,
    );
    this.name = "CyclicTypeError";
  }
}

export class AmbiguousFieldNameError extends StructuralError {
  constructor(
    public readonly argumentName: string,
    public readonly paths: readonly string[],
  ) {
    super(
      `Argument name "${argumentName}" is produced by more than one field: ${paths.map(describeWhere).join(", ")}`,
      ErrorCode.AMBIGUOUS_FIELD_NAME,
    );
    this.name = "AmbiguousFieldNameError";
  }
}

export class NoMatchingRuleError extends StructuralError {
  constructor(
    public readonly where: string,
    typeDescription: string,
  ) {
    super(
      `No constructor rule matches ${typeDescription} at ${describeWhere(where)}; register a primitive rule or annotate the field with a constructor spec`,
      ErrorCode.NO_MATCHING_RULE,
    );
    this.name = "NoMatchingRuleError";
  }
}

export class ConfigError extends StructuralError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/**
 * The front end produced values no tree node consumed. This is a bug in the
 * builder or the front end, never a user mistake.
 */
export class InternalInconsistencyError extends StructuralError {
  constructor(public readonly leftover: readonly string[]) {
    super(
      `Parsed values were not consumed by any argument: ${leftover.map(describeWhere).join(", ")}`,
      ErrorCode.INTERNAL_INCONSISTENCY,
    );
    this.name = "InternalInconsistencyError";
  }
}

// --- User input ---

export class MissingRequiredArgumentError extends InputError {
  constructor(
    path: string,
    /** How the user supplies it: `--flag`, a metavar, or a subcommand list. */
    public readonly argument: string,
  ) {
    super(`Missing required argument: ${argument}`, ErrorCode.MISSING_REQUIRED_ARGUMENT, path);
    this.name = "MissingRequiredArgumentError";
  }
}

export class ConversionError extends InputError {
  constructor(
    path: string,
    public readonly argument: string,
    public readonly rawTokens: readonly string[],
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Invalid value for ${argument}: ${JSON.stringify(rawTokens)}: ${reason}`,
      ErrorCode.CONVERSION_ERROR,
      path,
      options,
    );
    this.name = "ConversionError";
  }
}

export class InstantiationError extends InputError {
  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(
      path === "" ? `Could not build value: ${reason}` : `Could not build ${path}: ${reason}`,
      ErrorCode.INSTANTIATION_ERROR,
      path,
      options,
    );
    this.name = "InstantiationError";
  }
}

export class ArgumentSyntaxError extends InputError {
  constructor(message: string, path = "") {
    super(message, ErrorCode.ARGUMENT_SYNTAX_ERROR, path);
    this.name = "ArgumentSyntaxError";
  }
}
