export { buildParserTree, describeParserLevel } from "./builder.js";
export type { BuildOptions } from "./builder.js";
export { createStructAssembler } from "./assembly.js";
export type { Assembler } from "./assembly.js";
export { fieldSegment, variantSegment, renderKey, renderFlag, renderSubcommand } from "./paths.js";
