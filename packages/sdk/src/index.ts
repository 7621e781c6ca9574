// Types
export type {
  PrimitiveName,
  LiteralValue,
  LiteralOption,
  PrimitiveDescriptor,
  OptionalDescriptor,
  SequenceDescriptor,
  TupleDescriptor,
  MappingDescriptor,
  LiteralDescriptor,
  StructDescriptor,
  UnionVariant,
  UnionDescriptor,
  AlternativesDescriptor,
  TypeDescriptor,
  FieldDefault,
  SubcommandMarker,
  FieldMarkers,
  FieldDescriptor,
  PathSegment,
  FieldSpec,
} from "./types/descriptor.js";

export { REQUIRED, MISSING, defaultOf, isTypeDescriptor } from "./types/descriptor.js";

export type {
  Nargs,
  ConversionResult,
  ConstructorSpec,
  PrimitiveTypeInfo,
  SpecLookup,
  PrimitiveRule,
} from "./types/constructor.js";

export { converted, conversionFailed } from "./types/constructor.js";

export type {
  RawValue,
  FlatValues,
  LeafArgument,
  ChoiceVariantArgument,
  ChoiceArgument,
  ParserLevel,
  AssemblyResult,
  LeafNode,
  GroupNode,
  ChoiceNode,
  ParserNode,
} from "./types/parser.js";

export { ABSENT } from "./types/parser.js";

// Errors
export {
  ShapeArgsError,
  StructuralError,
  InputError,
  UnresolvedGenericError,
  UnsupportedUnionShapeError,
  CyclicTypeError,
  AmbiguousFieldNameError,
  NoMatchingRuleError,
  ConfigError,
  InternalInconsistencyError,
  MissingRequiredArgumentError,
  ConversionError,
  InstantiationError,
  ArgumentSyntaxError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
