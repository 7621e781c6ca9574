/**
 * Type resolver: turns a zod schema into a canonical TypeDescriptor.
 *
 * Transparent wrappers (effects, brand, readonly, catch, pipeline, lazy,
 * default) are peeled, `.optional()`/`.nullable()` become an optional
 * descriptor, type variables are substituted from the enclosing bindings,
 * and unions are classified as record unions (subcommands) or leaf
 * alternatives.
 */

import { z } from "zod";
import {
  CyclicTypeError,
  MISSING,
  REQUIRED,
  UnresolvedGenericError,
  UnsupportedUnionShapeError,
  defaultOf,
  isTypeDescriptor,
} from "@shapeargs/sdk";
import type {
  FieldDefault,
  FieldDescriptor,
  FieldMarkers,
  LiteralDescriptor,
  LiteralOption,
  LiteralValue,
  PrimitiveDescriptor,
  PrimitiveName,
  StructDescriptor,
  TypeDescriptor,
  UnionVariant,
} from "@shapeargs/sdk";
import { createLogger } from "@shapeargs/shared";
import { getAnnotations, type TypeBindings, type TypeVarInfo } from "../conf/index.js";
import { describeType } from "./describe.js";

const logger = createLogger("Resolver");

export interface ResolveOptions {
  bindings?: TypeBindings;
  /** Tree key used in error messages. */
  where?: string;
  /** Default value at this position; an unbound type variable takes its type. */
  inferFrom?: { value: unknown };
}

interface StackEntry {
  schema: z.ZodTypeAny;
  env: string;
}

interface ResolveState {
  env: TypeBindings;
  where: string;
  inferFrom?: { value: unknown };
  /** Outermost schema of the current position, kept while peeling transparent wrappers. */
  position?: z.ZodTypeAny;
  stack: StackEntry[];
}

/**
 * Resolve a schema into a descriptor. Passing a descriptor returns it
 * unchanged.
 *
 * @throws UnresolvedGenericError, UnsupportedUnionShapeError, CyclicTypeError
 */
export function resolveType(target: z.ZodTypeAny | TypeDescriptor, options: ResolveOptions = {}): TypeDescriptor {
  if (isTypeDescriptor(target)) return target;
  const descriptor = resolveNode(target, initialState(options));
  logger.debug("Resolved schema", { where: options.where ?? "", type: describeType(descriptor) });
  return descriptor;
}

/**
 * Resolve one object key. Returns undefined for `classVar` fields, which
 * never reach the CLI.
 */
export function resolveField(
  name: string,
  schema: z.ZodTypeAny,
  options: ResolveOptions = {},
): FieldDescriptor | undefined {
  return fieldOf(name, schema, initialState(options));
}

function initialState(options: ResolveOptions): ResolveState {
  return {
    env: options.bindings ?? {},
    where: options.where ?? "",
    inferFrom: options.inferFrom,
    stack: [],
  };
}

function joinWhere(where: string, name: string): string {
  return where === "" ? name : `${where}.${name}`;
}

// --- Wrapper walking ---

/** One step inside a wrapper schema, or undefined at a structural type. */
function innerOf(schema: z.ZodTypeAny): z.ZodTypeAny | undefined {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) return schema.unwrap();
  if (schema instanceof z.ZodDefault) return schema.removeDefault();
  if (schema instanceof z.ZodEffects) return schema.innerType();
  if (schema instanceof z.ZodBranded) return schema.unwrap();
  if (schema instanceof z.ZodReadonly) return schema.unwrap();
  if (schema instanceof z.ZodCatch) return schema.removeCatch();
  if (schema instanceof z.ZodPipeline) return schema._def.in;
  if (schema instanceof z.ZodLazy) return schema.schema;
  return undefined;
}

/** The schema followed by every wrapper below it, outermost first. */
function wrapperChain(schema: z.ZodTypeAny): z.ZodTypeAny[] {
  const chain: z.ZodTypeAny[] = [];
  const seen = new Set<z.ZodTypeAny>();
  let current: z.ZodTypeAny | undefined = schema;
  while (current && !seen.has(current)) {
    seen.add(current);
    chain.push(current);
    current = innerOf(current);
  }
  return chain;
}

/** Markers from every wrapper layer; outer layers win. */
export function collectMarkers(schema: z.ZodTypeAny): FieldMarkers {
  let merged: FieldMarkers = {};
  for (const layer of wrapperChain(schema)) {
    const annotations = getAnnotations(layer);
    if (annotations) merged = { ...annotations.markers, ...merged };
  }
  return merged;
}

function collectDescription(schema: z.ZodTypeAny): string | undefined {
  return wrapperChain(schema).find((layer) => layer.description !== undefined)?.description;
}

/** The outermost `.optional()` or `.default()` decides; neither means required. */
function findDefault(schema: z.ZodTypeAny): FieldDefault {
  for (const layer of wrapperChain(schema)) {
    if (layer instanceof z.ZodOptional) return MISSING;
    if (layer instanceof z.ZodDefault) return defaultOf(layer._def.defaultValue());
  }
  return REQUIRED;
}

function typeNameOf(schema: z.ZodTypeAny): string {
  const typeName: unknown = schema._def.typeName;
  return typeof typeName === "string" ? typeName : schema.constructor.name;
}

// --- Cycles and type variables ---

const schemaIds = new WeakMap<z.ZodTypeAny, number>();
let nextSchemaId = 0;

function idOf(schema: z.ZodTypeAny): number {
  let id = schemaIds.get(schema);
  if (id === undefined) {
    id = ++nextSchemaId;
    schemaIds.set(schema, id);
  }
  return id;
}

function envKey(env: TypeBindings): string {
  return Object.keys(env)
    .sort()
    .map((name) => `${name}=${idOf(env[name])}`)
    .join(",");
}

function withCycleCheck<T>(schema: z.ZodTypeAny, state: ResolveState, resolve: () => T): T {
  const env = envKey(state.env);
  if (state.stack.some((entry) => entry.schema === schema && entry.env === env)) {
    throw new CyclicTypeError(state.where, typeNameOf(schema));
  }
  state.stack.push({ schema, env });
  try {
    return resolve();
  } finally {
    state.stack.pop();
  }
}

/** Bindings whose value is itself a type variable are resolved against the outer scope. */
function enterBindings(outer: TypeBindings, bindings: TypeBindings): TypeBindings {
  const env: Record<string, z.ZodTypeAny> = { ...outer };
  for (const [name, bound] of Object.entries(bindings)) {
    const variable = getAnnotations(bound)?.typeVar;
    if (!variable) {
      env[name] = bound;
      continue;
    }
    const substitute = outer[variable.name] ?? variable.default;
    if (substitute) {
      env[name] = substitute;
    } else {
      delete env[name];
    }
  }
  return env;
}

function schemaForValue(holder: { value: unknown } | undefined): z.ZodTypeAny | undefined {
  if (!holder) return undefined;
  const value = holder.value;
  switch (typeof value) {
    case "string":
      return z.string();
    case "number":
      return Number.isInteger(value) ? z.number().int() : z.number();
    case "bigint":
      return z.bigint();
    case "boolean":
      return z.boolean();
  }
  if (value instanceof Date) return z.date();
  return undefined;
}

function bindTypeVar(variable: TypeVarInfo, state: ResolveState): z.ZodTypeAny {
  const bound = state.env[variable.name] ?? variable.default ?? schemaForValue(state.inferFrom);
  if (!bound) throw new UnresolvedGenericError(variable.name, state.where);
  return bound;
}

// --- Resolution ---

function resolveNode(schema: z.ZodTypeAny, state: ResolveState): TypeDescriptor {
  const position = state.position ?? schema;
  const annotations = getAnnotations(schema);

  if (annotations?.typeVar) {
    return resolveNode(bindTypeVar(annotations.typeVar, state), { ...state, position: undefined });
  }

  const env = annotations?.bindings ? enterBindings(state.env, annotations.bindings) : state.env;
  const peeled: ResolveState = { ...state, env, position };

  if (schema instanceof z.ZodLazy) {
    return withCycleCheck(schema, peeled, () => resolveNode(schema.schema, peeled));
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    const inner = resolveNode(schema.unwrap(), { ...peeled, position: undefined });
    return optionalOf(inner, schema instanceof z.ZodNullable ? null : undefined);
  }
  if (
    schema instanceof z.ZodDefault ||
    schema instanceof z.ZodEffects ||
    schema instanceof z.ZodBranded ||
    schema instanceof z.ZodReadonly ||
    schema instanceof z.ZodCatch ||
    schema instanceof z.ZodPipeline
  ) {
    const inner = innerOf(schema);
    if (inner) return resolveNode(inner, peeled);
  }

  if (schema instanceof z.ZodObject) {
    return withCycleCheck(schema, peeled, () => structOf(schema, position, peeled));
  }
  if (schema instanceof z.ZodDiscriminatedUnion) {
    const options: z.ZodTypeAny[] = schema.options;
    return unionOf(options, schema.discriminator, peeled);
  }
  if (schema instanceof z.ZodUnion) {
    const options: z.ZodTypeAny[] = schema.options;
    return unionOf(options, undefined, peeled);
  }

  const nested: ResolveState = { ...peeled, position: undefined, inferFrom: undefined };

  if (schema instanceof z.ZodLiteral) return literalOf([schema.value]) ?? primitive("opaque", schema);
  if (schema instanceof z.ZodEnum) {
    const options: string[] = schema.options;
    return literalOf(options) ?? primitive("opaque", schema);
  }
  if (schema instanceof z.ZodNativeEnum) return nativeEnumOf(schema.enum);
  if (schema instanceof z.ZodNull) return { kind: "literal", options: [{ label: "null", value: null }] };
  if (schema instanceof z.ZodUndefined) return { kind: "literal", options: [{ label: "undefined", value: undefined }] };

  if (schema instanceof z.ZodArray) {
    const minLength = schema._def.exactLength?.value ?? schema._def.minLength?.value ?? 0;
    return { kind: "sequence", element: resolveNode(schema.element, nested), container: "array", minLength };
  }
  if (schema instanceof z.ZodSet) {
    return {
      kind: "sequence",
      element: resolveNode(schema._def.valueType, nested),
      container: "set",
      minLength: schema._def.minSize?.value ?? 0,
    };
  }
  if (schema instanceof z.ZodTuple) {
    const items: z.ZodTypeAny[] = schema.items;
    const rest: z.ZodTypeAny | null = schema._def.rest;
    return {
      kind: "tuple",
      elements: items.map((item) => resolveNode(item, nested)),
      rest: rest ? resolveNode(rest, nested) : undefined,
    };
  }
  if (schema instanceof z.ZodRecord) {
    return {
      kind: "mapping",
      key: resolveNode(schema.keySchema, nested),
      value: resolveNode(schema.valueSchema, nested),
      container: "record",
    };
  }
  if (schema instanceof z.ZodMap) {
    return {
      kind: "mapping",
      key: resolveNode(schema._def.keyType, nested),
      value: resolveNode(schema._def.valueType, nested),
      container: "map",
    };
  }

  if (schema instanceof z.ZodString) return primitive("string", schema);
  if (schema instanceof z.ZodNumber) return primitive(schema.isInt ? "integer" : "number", schema);
  if (schema instanceof z.ZodBigInt) return primitive("bigint", schema);
  if (schema instanceof z.ZodBoolean) return primitive("boolean", schema);
  if (schema instanceof z.ZodDate) return primitive("date", schema);
  if (schema instanceof z.ZodUnknown || schema instanceof z.ZodAny) return primitive("unknown", schema);
  return primitive("opaque", schema);
}

function primitive(name: PrimitiveName, schema: z.ZodTypeAny): PrimitiveDescriptor {
  return { kind: "primitive", name, typeName: typeNameOf(schema), schema };
}

function optionalOf(inner: TypeDescriptor, absent: null | undefined): TypeDescriptor {
  // `.optional().nullable()` collapses to one optional; null wins as the shown absent value.
  if (inner.kind === "optional") {
    return { kind: "optional", inner: inner.inner, absent: inner.absent === null ? null : absent };
  }
  return { kind: "optional", inner, absent };
}

function isLiteralValue(value: unknown): value is LiteralValue {
  return (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean"
  );
}

function literalOf(values: readonly unknown[]): LiteralDescriptor | undefined {
  const options: LiteralOption[] = [];
  for (const value of values) {
    if (!isLiteralValue(value)) return undefined;
    options.push({ label: String(value), value });
  }
  return { kind: "literal", options };
}

/** Member names become labels; reverse mappings of numeric members are skipped. */
function nativeEnumOf(members: Record<string, string | number>): LiteralDescriptor {
  const options: LiteralOption[] = [];
  for (const [label, value] of Object.entries(members)) {
    if (typeof value === "string" && typeof members[value] === "number") continue;
    options.push({ label, value });
  }
  return { kind: "literal", options };
}

function fieldOf(name: string, schema: z.ZodTypeAny, state: ResolveState): FieldDescriptor | undefined {
  const markers = collectMarkers(schema);
  if (markers.classVar) return undefined;

  const fieldDefault = findDefault(schema);
  const descriptor = resolveNode(schema, {
    ...state,
    position: undefined,
    inferFrom: fieldDefault.kind === "value" ? { value: fieldDefault.value } : undefined,
  });
  return {
    name,
    descriptor,
    schema,
    default: fieldDefault,
    doc: markers.help ?? collectDescription(schema),
    markers,
  };
}

function structOf(objectSchema: z.AnyZodObject, position: z.ZodTypeAny, state: ResolveState): StructDescriptor {
  const shape: Record<string, z.ZodTypeAny> = objectSchema.shape;
  const fields: FieldDescriptor[] = [];
  for (const [name, fieldSchema] of Object.entries(shape)) {
    const field = fieldOf(name, fieldSchema, { ...state, where: joinWhere(state.where, name) });
    if (field) fields.push(field);
  }
  const markers = collectMarkers(position);
  return {
    kind: "struct",
    name: markers.subcommand?.name,
    doc: markers.help ?? collectDescription(position),
    fields,
    schema: position,
    objectSchema,
  };
}

function isLeafShaped(descriptor: TypeDescriptor): boolean {
  switch (descriptor.kind) {
    case "struct":
    case "union":
      return false;
    case "optional":
      return isLeafShaped(descriptor.inner);
    default:
      return true;
  }
}

/** Label of a single-literal field, the way discriminated unions tag variants. */
function tagOf(struct: StructDescriptor, fieldName: string): string | undefined {
  const descriptor = struct.fields.find((candidate) => candidate.name === fieldName)?.descriptor;
  if (descriptor?.kind !== "literal" || descriptor.options.length !== 1) return undefined;
  return descriptor.options[0].label;
}

/** A field every variant pins to a distinct single literal. */
function findDiscriminator(structs: readonly StructDescriptor[]): string | undefined {
  for (const field of structs[0].fields) {
    const tags = structs.map((struct) => tagOf(struct, field.name));
    if (tags.every((tag) => tag !== undefined) && new Set(tags).size === tags.length) return field.name;
  }
  return undefined;
}

function unionOf(options: readonly z.ZodTypeAny[], declared: string | undefined, state: ResolveState): TypeDescriptor {
  const hasNull = options.some((option) => option instanceof z.ZodNull);
  const hasUndefined = options.some((option) => option instanceof z.ZodUndefined);
  const present = options.filter((option) => !(option instanceof z.ZodNull || option instanceof z.ZodUndefined));

  if (present.length === 0) {
    return {
      kind: "literal",
      options: options.map((option) =>
        option instanceof z.ZodNull ? { label: "null", value: null } : { label: "undefined", value: undefined },
      ),
    };
  }

  const member: ResolveState = { ...state, position: undefined };
  const resolved = present.map((option) => resolveNode(option, member));
  const core = present.length === 1 ? resolved[0] : classifyUnion(present, resolved, declared, state.where);

  if (hasNull) return optionalOf(core, null);
  if (hasUndefined) return optionalOf(core, undefined);
  return core;
}

function classifyUnion(
  options: readonly z.ZodTypeAny[],
  resolved: readonly TypeDescriptor[],
  declared: string | undefined,
  where: string,
): TypeDescriptor {
  const structs = resolved.filter((descriptor): descriptor is StructDescriptor => descriptor.kind === "struct");

  if (structs.length === resolved.length) {
    const discriminator = declared ?? findDiscriminator(structs);
    const variants: UnionVariant[] = structs.map((struct, index) => {
      const marker = collectMarkers(options[index]).subcommand;
      const name = marker?.name ?? (discriminator === undefined ? undefined : tagOf(struct, discriminator));
      if (name === undefined) {
        throw new UnsupportedUnionShapeError(
          where,
          `variant ${index + 1} has no name; wrap it in subcommand(schema, { name }) or give every variant a distinct literal tag field`,
        );
      }
      return { name, help: marker?.help ?? struct.doc, descriptor: struct };
    });
    return { kind: "union", variants, discriminator };
  }

  if (resolved.every(isLeafShaped)) {
    if (resolved.every((descriptor) => descriptor.kind === "literal")) {
      const merged = resolved.flatMap((descriptor) => (descriptor.kind === "literal" ? descriptor.options : []));
      return { kind: "literal", options: merged };
    }
    return { kind: "alternatives", members: resolved };
  }

  throw new UnsupportedUnionShapeError(
    where,
    `cannot mix object variants with ${resolved
      .filter((descriptor) => descriptor.kind !== "struct")
      .map(describeType)
      .join(", ")}`,
  );
}
