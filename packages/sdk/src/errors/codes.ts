/**
 * Error codes carried by every ShapeArgsError.
 */

export const ErrorCode = {
  // Structural: the schema cannot be turned into a CLI.
  UNRESOLVED_GENERIC: "UNRESOLVED_GENERIC",
  UNSUPPORTED_UNION_SHAPE: "UNSUPPORTED_UNION_SHAPE",
  CYCLIC_TYPE: "CYCLIC_TYPE",
  AMBIGUOUS_FIELD_NAME: "AMBIGUOUS_FIELD_NAME",
  NO_MATCHING_RULE: "NO_MATCHING_RULE",
  CONFIG_ERROR: "CONFIG_ERROR",
  INTERNAL_INCONSISTENCY: "INTERNAL_INCONSISTENCY",

  // User input: the command line does not fit the schema.
  MISSING_REQUIRED_ARGUMENT: "MISSING_REQUIRED_ARGUMENT",
  CONVERSION_ERROR: "CONVERSION_ERROR",
  INSTANTIATION_ERROR: "INSTANTIATION_ERROR",
  ARGUMENT_SYNTAX_ERROR: "ARGUMENT_SYNTAX_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
