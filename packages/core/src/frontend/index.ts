export { parseArgv } from "./parser.js";
export type { FrontEndResult, FrontEndState } from "./parser.js";
export { formatUsage, formatHelp } from "./usage.js";
