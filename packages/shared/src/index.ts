export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { CliOptionsSchema } from "./utils/config-schema.js";

export { hyphenate, formatChoices, displayToken } from "./utils/strings.js";
