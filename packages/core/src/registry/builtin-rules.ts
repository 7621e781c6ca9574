/**
 * Built-in primitive rules, consulted after every user rule.
 */

import { conversionFailed, converted } from "@shapeargs/sdk";
import type {
  AlternativesDescriptor,
  ConstructorSpec,
  ConversionResult,
  LiteralDescriptor,
  MappingDescriptor,
  Nargs,
  OptionalDescriptor,
  PrimitiveRule,
  SequenceDescriptor,
  SpecLookup,
  TupleDescriptor,
} from "@shapeargs/sdk";
import { formatChoices } from "@shapeargs/shared";

const BOOLEAN_TOKENS: ReadonlyMap<string, boolean> = new Map([
  ["True", true],
  ["true", true],
  ["False", false],
  ["false", false],
]);

function single(
  metavar: string,
  parse: (token: string) => ConversionResult,
  format: (value: unknown) => string,
  accepts: (value: unknown) => boolean,
  choices?: readonly string[],
): ConstructorSpec {
  return {
    nargs: 1,
    metavar,
    choices,
    instanceFromTokens(tokens) {
      if (tokens.length !== 1) return conversionFailed(`expected 1 token, got ${tokens.length}`);
      return parse(tokens[0]);
    },
    tokensFromInstance: (value) => [format(value)],
    accepts,
  };
}

export const stringSpec: ConstructorSpec = single(
  "STR",
  (token) => converted(token),
  String,
  (value) => typeof value === "string",
);

export const numberSpec: ConstructorSpec = single(
  "FLOAT",
  (token) => {
    const value = Number(token);
    return token.trim() === "" || Number.isNaN(value)
      ? conversionFailed(`"${token}" is not a number`)
      : converted(value);
  },
  String,
  (value) => typeof value === "number",
);

export const integerSpec: ConstructorSpec = single(
  "INT",
  (token) => {
    const value = Number(token);
    if (token.trim() === "" || !Number.isInteger(value)) return conversionFailed(`"${token}" is not an integer`);
    return Number.isSafeInteger(value)
      ? converted(value)
      : conversionFailed(`"${token}" is outside the safe integer range; use z.bigint()`);
  },
  String,
  (value) => typeof value === "number" && Number.isInteger(value),
);

export const bigintSpec: ConstructorSpec = single(
  "INT",
  (token) => {
    if (token.trim() === "") return conversionFailed(`"${token}" is not an integer`);
    try {
      return converted(BigInt(token));
    } catch {
      return conversionFailed(`"${token}" is not an integer`);
    }
  },
  String,
  (value) => typeof value === "bigint",
);

export const booleanSpec: ConstructorSpec = single(
  formatChoices(["True", "False"]),
  (token) => {
    const value = BOOLEAN_TOKENS.get(token);
    return value === undefined ? conversionFailed(`"${token}" is not one of True, False`) : converted(value);
  },
  (value) => (value ? "True" : "False"),
  (value) => typeof value === "boolean",
  ["True", "False"],
);

export const dateSpec: ConstructorSpec = single(
  "DATETIME",
  (token) => {
    const value = new Date(token);
    return Number.isNaN(value.getTime()) ? conversionFailed(`"${token}" is not a date`) : converted(value);
  },
  (value) => (value instanceof Date ? value.toISOString() : String(value)),
  (value) => value instanceof Date && !Number.isNaN(value.getTime()),
);

export function literalSpec(descriptor: LiteralDescriptor): ConstructorSpec {
  const labels = descriptor.options.map((option) => option.label);
  return single(
    formatChoices(labels),
    (token) => {
      const option = descriptor.options.find((candidate) => candidate.label === token);
      return option ? converted(option.value) : conversionFailed(`"${token}" is not one of ${labels.join(", ")}`);
    },
    (value) => descriptor.options.find((option) => Object.is(option.value, value))?.label ?? String(value),
    (value) => descriptor.options.some((option) => Object.is(option.value, value)),
    labels,
  );
}

/**
 * `null` is typed as the token "null". An undefined absent value has no token,
 * so it is not accepted as a displayable instance.
 */
export function optionalSpec(descriptor: OptionalDescriptor, lookup: SpecLookup): ConstructorSpec {
  const inner = lookup(descriptor.inner);
  if (descriptor.absent === undefined) {
    return {
      nargs: inner.nargs,
      metavar: inner.metavar,
      choices: inner.choices,
      instanceFromTokens: (tokens) => inner.instanceFromTokens(tokens),
      tokensFromInstance: (value) => inner.tokensFromInstance(value),
      accepts: (value) => value !== undefined && inner.accepts(value),
    };
  }
  return {
    nargs: inner.nargs,
    metavar: inner.metavar,
    choices: inner.choices ? [...inner.choices, "null"] : undefined,
    instanceFromTokens(tokens) {
      if (tokens.length === 1 && tokens[0] === "null") return converted(null);
      return inner.instanceFromTokens(tokens);
    },
    tokensFromInstance: (value) => (value === null ? ["null"] : inner.tokensFromInstance(value)),
    accepts: (value) => value === null || inner.accepts(value),
  };
}

function fixedCount(nargs: Nargs): number | undefined {
  return typeof nargs === "number" ? nargs : undefined;
}

function chunk(tokens: readonly string[], size: number): string[][] {
  const chunks: string[][] = [];
  for (let i = 0; i < tokens.length; i += size) chunks.push(tokens.slice(i, i + size));
  return chunks;
}

function convertAll(specs: readonly ConstructorSpec[], groups: readonly string[][]): ConversionResult<unknown[]> {
  const values: unknown[] = [];
  for (const [index, group] of groups.entries()) {
    const result = specs[index].instanceFromTokens(group);
    if (!result.ok) return result;
    values.push(result.value);
  }
  return converted(values);
}

export function sequenceSpec(descriptor: SequenceDescriptor, lookup: SpecLookup): ConstructorSpec | undefined {
  const element = lookup(descriptor.element);
  const width = fixedCount(element.nargs);
  if (width === undefined || width === 0) return undefined;
  const nargs = descriptor.minLength > 0 ? "+" : "*";
  const isSet = descriptor.container === "set";
  const items = (value: unknown): unknown[] | undefined => {
    if (isSet) return value instanceof Set ? [...value] : undefined;
    return Array.isArray(value) ? value : undefined;
  };

  return {
    nargs,
    metavar: element.metavar,
    choices: element.choices,
    instanceFromTokens(tokens) {
      if (tokens.length % width !== 0) {
        return conversionFailed(`expected a multiple of ${width} tokens, got ${tokens.length}`);
      }
      const groups = chunk(tokens, width);
      if (groups.length < descriptor.minLength) {
        return conversionFailed(`expected at least ${descriptor.minLength} values, got ${groups.length}`);
      }
      const result = convertAll(
        groups.map(() => element),
        groups,
      );
      if (!result.ok) return result;
      return converted(isSet ? new Set(result.value) : result.value);
    },
    tokensFromInstance: (value) => (items(value) ?? []).flatMap((item) => element.tokensFromInstance(item)),
    accepts: (value) => items(value)?.every((item) => element.accepts(item)) ?? false,
  };
}

export function tupleSpec(descriptor: TupleDescriptor, lookup: SpecLookup): ConstructorSpec | undefined {
  const specs = descriptor.elements.map(lookup);
  const widths = specs.map((spec) => fixedCount(spec.nargs));
  if (widths.some((width) => width === undefined)) return undefined;
  const fixedWidths = widths.map((width) => width ?? 0);
  const total = fixedWidths.reduce((sum, width) => sum + width, 0);

  const rest = descriptor.rest ? lookup(descriptor.rest) : undefined;
  const restWidth = rest ? fixedCount(rest.nargs) : undefined;
  if (rest && (restWidth === undefined || restWidth === 0)) return undefined;

  const nargs: Nargs = rest ? (total > 0 ? "+" : "*") : total;
  const metavar = [...specs.map((spec) => spec.metavar), ...(rest ? [`[${rest.metavar} ...]`] : [])].join(" ");

  return {
    nargs,
    metavar,
    instanceFromTokens(tokens) {
      const extra = tokens.length - total;
      if (extra < 0 || (!rest && extra !== 0) || (rest && restWidth && extra % restWidth !== 0)) {
        return conversionFailed(`expected ${rest ? "at least " : ""}${total} tokens, got ${tokens.length}`);
      }
      const groups: string[][] = [];
      let offset = 0;
      for (const width of fixedWidths) {
        groups.push(tokens.slice(offset, offset + width));
        offset += width;
      }
      if (!rest || !restWidth) return convertAll(specs, groups);
      const restGroups = chunk(tokens.slice(offset), restWidth);
      return convertAll([...specs, ...restGroups.map(() => rest)], [...groups, ...restGroups]);
    },
    tokensFromInstance(value) {
      if (!Array.isArray(value)) return [];
      return value.flatMap((item, index) => (specs[index] ?? rest)?.tokensFromInstance(item) ?? []);
    },
    accepts(value) {
      if (!Array.isArray(value)) return false;
      if (rest ? value.length < specs.length : value.length !== specs.length) return false;
      return value.every((item, index) => (specs[index] ?? rest)?.accepts(item) ?? false);
    },
  };
}

export function mappingSpec(descriptor: MappingDescriptor, lookup: SpecLookup): ConstructorSpec | undefined {
  const key = lookup(descriptor.key);
  const value = lookup(descriptor.value);
  const keyWidth = fixedCount(key.nargs);
  const valueWidth = fixedCount(value.nargs);
  if (!keyWidth || !valueWidth) return undefined;
  const width = keyWidth + valueWidth;
  const isMap = descriptor.container === "map";

  const entriesOf = (instance: unknown): [unknown, unknown][] | undefined => {
    if (isMap) return instance instanceof Map ? [...instance.entries()] : undefined;
    if (typeof instance !== "object" || instance === null || Array.isArray(instance)) return undefined;
    return Object.entries(instance);
  };

  return {
    nargs: "*",
    metavar: `${key.metavar} ${value.metavar}`,
    instanceFromTokens(tokens) {
      if (tokens.length % width !== 0) {
        return conversionFailed(`expected key/value pairs, got ${tokens.length} tokens`);
      }
      const entries: [unknown, unknown][] = [];
      for (const pair of chunk(tokens, width)) {
        const k = key.instanceFromTokens(pair.slice(0, keyWidth));
        if (!k.ok) return k;
        const v = value.instanceFromTokens(pair.slice(keyWidth));
        if (!v.ok) return v;
        entries.push([k.value, v.value]);
      }
      if (isMap) return converted(new Map(entries));
      return converted(Object.fromEntries(entries.map(([k, v]) => [String(k), v])));
    },
    tokensFromInstance: (instance) =>
      (entriesOf(instance) ?? []).flatMap(([k, v]) => [...key.tokensFromInstance(k), ...value.tokensFromInstance(v)]),
    accepts(instance) {
      const entries = entriesOf(instance);
      if (!entries) return false;
      // Record keys are always strings at run time; only the values can be checked.
      return entries.every(([k, v]) => (isMap ? key.accepts(k) : true) && value.accepts(v));
    },
  };
}

/**
 * Members are tried in declared order; the first successful conversion
 * wins.
 */
export function alternativesSpec(descriptor: AlternativesDescriptor, lookup: SpecLookup): ConstructorSpec {
  const members = descriptor.members.map(lookup);
  const first = members[0].nargs;
  const nargs: Nargs = members.every((member) => member.nargs === first) ? first : "+";
  const withChoices = members.every((member) => member.choices !== undefined);
  const choices = withChoices ? [...new Set(members.flatMap((member) => member.choices ?? []))] : undefined;
  const metavar = choices ? formatChoices(choices) : [...new Set(members.map((member) => member.metavar))].join("|");

  return {
    nargs,
    metavar,
    choices,
    instanceFromTokens(tokens) {
      for (const member of members) {
        if (typeof member.nargs === "number" && member.nargs !== tokens.length) continue;
        const result = member.instanceFromTokens(tokens);
        if (result.ok) return result;
      }
      return conversionFailed(`${JSON.stringify(tokens.join(" "))} matches none of ${metavar}`);
    },
    tokensFromInstance(value) {
      const member = members.find((candidate) => candidate.accepts(value));
      return member ? member.tokensFromInstance(value) : [String(value)];
    },
    accepts: (value) => members.some((member) => member.accepts(value)),
  };
}

export const BUILTIN_RULES: readonly PrimitiveRule[] = [
  ({ descriptor }, lookup) => {
    switch (descriptor.kind) {
      case "primitive":
        switch (descriptor.name) {
          case "string":
            return stringSpec;
          case "number":
            return numberSpec;
          case "integer":
            return integerSpec;
          case "bigint":
            return bigintSpec;
          case "boolean":
            return booleanSpec;
          case "date":
            return dateSpec;
          default:
            return undefined;
        }
      case "literal":
        return literalSpec(descriptor);
      case "optional":
        return optionalSpec(descriptor, lookup);
      case "sequence":
        return sequenceSpec(descriptor, lookup);
      case "tuple":
        return tupleSpec(descriptor, lookup);
      case "mapping":
        return mappingSpec(descriptor, lookup);
      case "alternatives":
        return alternativesSpec(descriptor, lookup);
      default:
        return undefined;
    }
  },
];
