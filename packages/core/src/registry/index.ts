export { createConstructorRegistry } from "./constructor-registry.js";
export type { ConstructorRegistry } from "./constructor-registry.js";
export {
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
} from "./builtin-rules.js";
