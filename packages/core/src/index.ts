// Entry points
export { cli, parseCli } from "./cli.js";
export type { CliOptions, CliOutcome } from "./cli.js";
export { defineCommand, isCommandTarget } from "./command.js";
export type { CommandTarget, CommandDefinition } from "./command.js";

// Markers
export * as conf from "./conf/index.js";
export { typeVar, bindTypeVars, subcommand, getAnnotations } from "./conf/index.js";
export type { ArgOptions, SchemaAnnotations, TypeBindings, TypeVarInfo } from "./conf/index.js";

// Constructor registry
export {
  createConstructorRegistry,
  BUILTIN_RULES,
  stringSpec,
  numberSpec,
  integerSpec,
  bigintSpec,
  booleanSpec,
  dateSpec,
  literalSpec,
  optionalSpec,
  sequenceSpec,
  tupleSpec,
  mappingSpec,
  alternativesSpec,
} from "./registry/index.js";
export type { ConstructorRegistry } from "./registry/index.js";

// Resolver
export { resolveType, resolveField, collectMarkers, describeType } from "./resolver/index.js";
export type { ResolveOptions } from "./resolver/index.js";

// Tree builder
export {
  buildParserTree,
  describeParserLevel,
  createStructAssembler,
  fieldSegment,
  variantSegment,
  renderKey,
  renderFlag,
  renderSubcommand,
} from "./schema/index.js";
export type { BuildOptions, Assembler } from "./schema/index.js";

// Front end
export { parseArgv, formatUsage, formatHelp } from "./frontend/index.js";
export type { FrontEndResult, FrontEndState } from "./frontend/index.js";

// Reconstruction
export { reconstruct, reconstructAll } from "./calling/index.js";
export type { ReconstructResult } from "./calling/index.js";
