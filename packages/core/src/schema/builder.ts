/**
 * Parser tree builder.
 *
 * Walks a resolved descriptor and produces leaf, group and choice nodes,
 * each carrying its tree key and, for exposed positions, the argument the
 * front end needs. Defaults from a supplied instance replace schema
 * defaults field by field.
 */

import type { z } from "zod";
import {
  AmbiguousFieldNameError,
  ConfigError,
  REQUIRED,
  defaultOf,
} from "@shapeargs/sdk";
import type {
  ChoiceArgument,
  ChoiceNode,
  ChoiceVariantArgument,
  FieldDefault,
  FieldDescriptor,
  FieldSpec,
  GroupNode,
  LeafArgument,
  LeafNode,
  ParserLevel,
  ParserNode,
  PathSegment,
  StructDescriptor,
  UnionDescriptor,
} from "@shapeargs/sdk";
import { createLogger } from "@shapeargs/shared";
import type { ConstructorRegistry } from "../registry/index.js";
import { resolveField, resolveType } from "../resolver/index.js";
import { createStructAssembler } from "./assembly.js";
import { fieldSegment, renderFlag, renderKey, renderSubcommand, variantSegment } from "./paths.js";

const logger = createLogger("ParserBuilder");

/** Flags the front end claims for itself. */
const RESERVED_FLAGS = new Set(["help"]);

export interface BuildOptions {
  registry: ConstructorRegistry;
  /** Value whose fields replace the schema's defaults. */
  defaultInstance?: { value: unknown };
}

type Supplied = { value: unknown } | undefined;

interface Scope {
  path: readonly PathSegment[];
  /** Field names making up the flag prefix of the children. */
  flags: readonly string[];
}

interface VariantPlan {
  name: string;
  help?: string;
  matches(value: unknown): boolean;
  build(supplied: Supplied): GroupNode;
}

/** A missing optional choice selects its "none" variant. */
function choiceDefault(spec: FieldSpec): Supplied {
  const fieldDefault = spec.default;
  if (fieldDefault.kind === "value") return { value: fieldDefault.value };
  if (fieldDefault.kind === "missing") return { value: undefined };
  const marker = spec.markers.subcommand;
  return marker && "default" in marker ? { value: marker.default } : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function suppliedField(instance: Supplied, name: string): Supplied {
  if (!instance || !isRecord(instance.value)) return undefined;
  return Object.prototype.hasOwnProperty.call(instance.value, name) ? { value: instance.value[name] } : undefined;
}

/**
 * Build the parser tree for `target`. A record target becomes the root
 * group; anything else is wrapped as a single unnamed field.
 *
 * @throws StructuralError subclasses when the schema cannot become a CLI
 */
export function buildParserTree(target: z.ZodTypeAny, options: BuildOptions): GroupNode {
  const { registry, defaultInstance } = options;
  const descriptor = resolveType(target);

  function buildField(
    field: FieldDescriptor,
    scope: Scope,
    supplied: Supplied,
    fixedTo?: { value: unknown },
  ): ParserNode {
    const segment = field.markers.name ?? field.name;
    const path = [...scope.path, fieldSegment(segment)];
    const flags = [...scope.flags, segment];
    const spec: FieldSpec = {
      name: field.name,
      descriptor: field.descriptor,
      default: fixedTo ? defaultOf(fixedTo.value) : supplied ? defaultOf(supplied.value) : field.default,
      doc: field.doc,
      path,
      key: renderKey(path),
      flag: renderFlag(flags),
      markers: fixedTo ? { ...field.markers, fixed: true } : field.markers,
    };
    const childFlags = spec.markers.omitPrefix ? scope.flags : flags;
    const type = field.descriptor;

    // A fixed or suppressed record or union is not expanded; it always takes its default.
    if (spec.markers.fixed || spec.markers.suppress) return buildLeaf(spec);

    if (type.kind === "struct") return buildGroup(spec, type, childFlags);
    if (type.kind === "union") return buildChoice(spec, unionPlans(spec, type, childFlags));
    if (type.kind === "optional" && (type.inner.kind === "struct" || type.inner.kind === "union")) {
      const absent = type.absent;
      const none: VariantPlan = {
        name: "none",
        matches: (value) => value === null || value === undefined,
        build: () => ({
          kind: "group",
          field: variantSpec(spec, "none", REQUIRED),
          children: [],
          assemble: () => ({ ok: true, value: absent }),
        }),
      };
      const inner = type.inner;
      const plans =
        inner.kind === "union"
          ? unionPlans(spec, inner, childFlags)
          : [structPlan(spec, inner, inner.name ?? (spec.name === "" ? "value" : spec.name), childFlags)];
      return buildChoice(spec, [none, ...plans]);
    }
    return buildLeaf(spec);
  }

  function buildGroup(
    spec: FieldSpec,
    struct: StructDescriptor,
    flags: readonly string[],
    fixed?: ReadonlyMap<string, unknown>,
  ): GroupNode {
    const instance: Supplied = spec.default.kind === "value" ? { value: spec.default.value } : undefined;
    const scope: Scope = { path: spec.path, flags };
    const children = struct.fields.map((field) =>
      buildField(
        field,
        scope,
        suppliedField(instance, field.name),
        fixed?.has(field.name) ? { value: fixed.get(field.name) } : undefined,
      ),
    );
    const passthrough = children.filter((child) => child.kind !== "leaf").map((child) => child.field.name);
    return {
      kind: "group",
      field: spec,
      children,
      assemble: createStructAssembler(struct, passthrough),
    };
  }

  function buildLeaf(spec: FieldSpec): LeafNode {
    const { markers, descriptor } = spec;
    if (markers.fixed || markers.suppress) {
      if (spec.default.kind === "required") {
        throw new ConfigError(`Field ${spec.key} is fixed but has no default value`);
      }
      return { kind: "leaf", field: spec };
    }

    const constructorSpec = registry.lookup({ descriptor, markers }, spec.key);
    const positional = markers.positional === true;
    const fieldDefault = spec.default;
    const defaultValue = fieldDefault.kind === "value" ? fieldDefault.value : undefined;
    const booleanFlag =
      !positional &&
      !markers.flagConversionOff &&
      descriptor.kind === "primitive" &&
      descriptor.name === "boolean" &&
      typeof defaultValue === "boolean";

    const argument: LeafArgument = {
      key: spec.key,
      flag: positional ? undefined : spec.flag,
      positional,
      nargs: constructorSpec.nargs,
      metavar: markers.metavar ?? constructorSpec.metavar,
      choices: constructorSpec.choices,
      required: fieldDefault.kind === "required",
      defaultDisplay:
        fieldDefault.kind === "value" && constructorSpec.accepts(defaultValue)
          ? constructorSpec.tokensFromInstance(defaultValue)
          : undefined,
      help: spec.doc,
      booleanFlag,
    };
    return { kind: "leaf", field: spec, spec: constructorSpec, argument };
  }

  function variantSpec(
    parent: FieldSpec,
    name: string,
    fieldDefault: FieldDefault,
    descriptor?: StructDescriptor,
    help?: string,
  ): FieldSpec {
    const path = [...parent.path, variantSegment(name)];
    return {
      name: parent.name,
      descriptor: descriptor ?? parent.descriptor,
      default: fieldDefault,
      doc: help,
      path,
      key: renderKey(path),
      flag: parent.flag,
      markers: {},
    };
  }

  function structPlan(
    parent: FieldSpec,
    struct: StructDescriptor,
    name: string,
    flags: readonly string[],
    help?: string,
  ): VariantPlan {
    return {
      name,
      help: help ?? struct.doc,
      matches: (value) => struct.schema.safeParse(value).success,
      build: (supplied) =>
        buildGroup(
          variantSpec(parent, name, supplied ? defaultOf(supplied.value) : REQUIRED, struct, help ?? struct.doc),
          struct,
          flags,
        ),
    };
  }

  function unionPlans(parent: FieldSpec, union: UnionDescriptor, flags: readonly string[]): VariantPlan[] {
    const discriminator = union.discriminator;
    return union.variants.map((variant) => {
      const plan = structPlan(parent, variant.descriptor, variant.name, flags, variant.help);
      if (discriminator === undefined) return plan;

      const tag = variant.descriptor.fields.find((field) => field.name === discriminator)?.descriptor;
      const tagValue = tag?.kind === "literal" ? tag.options[0]?.value : undefined;
      const fixed = new Map<string, unknown>([[discriminator, tagValue]]);
      return {
        ...plan,
        matches: (value: unknown) => isRecord(value) && Object.is(value[discriminator], tagValue),
        build: (supplied: Supplied) =>
          buildGroup(
            variantSpec(
              parent,
              variant.name,
              supplied ? defaultOf(supplied.value) : REQUIRED,
              variant.descriptor,
              plan.help,
            ),
            variant.descriptor,
            flags,
            fixed,
          ),
      };
    });
  }

  function buildChoice(spec: FieldSpec, plans: readonly VariantPlan[]): ParserNode {
    const marker = spec.markers.subcommand;
    const supplied = choiceDefault(spec);
    const defaultIndex = supplied ? plans.findIndex((plan) => plan.matches(supplied.value)) : -1;
    if (supplied && defaultIndex < 0) {
      throw new ConfigError(`Default value for ${spec.key || "<root>"} matches none of its variants`);
    }

    if (spec.markers.avoidSubcommands && defaultIndex >= 0) {
      return plans[defaultIndex].build(supplied);
    }

    const variants = new Map<string, ParserNode>();
    const variantArguments: ChoiceVariantArgument[] = [];
    let defaultVariant: string | undefined;
    for (const [index, plan] of plans.entries()) {
      const node = plan.build(index === defaultIndex ? supplied : undefined);
      const token = renderSubcommand(node.field.path);
      if (variants.has(token)) throw new AmbiguousFieldNameError(token, [spec.key, node.field.key]);
      variants.set(token, node);
      variantArguments.push({ name: token, help: plan.help, level: describeParserLevel(node) });
      if (index === defaultIndex) defaultVariant = token;
    }

    const argument: ChoiceArgument = {
      key: spec.key,
      required: defaultVariant === undefined,
      defaultVariant,
      help: spec.doc ?? marker?.help,
      variants: variantArguments,
    };
    const choice: ChoiceNode = { kind: "choice", field: spec, variants, defaultVariant, argument };
    return choice;
  }

  let root: GroupNode;
  if (descriptor.kind === "struct") {
    const rootSpec: FieldSpec = {
      name: "",
      descriptor,
      default: defaultInstance ? defaultOf(defaultInstance.value) : REQUIRED,
      doc: descriptor.doc,
      path: [],
      key: "",
      flag: "",
      markers: {},
    };
    root = buildGroup(rootSpec, descriptor, []);
  } else {
    const field = resolveField("", target);
    if (!field) throw new ConfigError("The target schema is marked classVar and has nothing to parse");
    const positionalField = { ...field, markers: { ...field.markers, positional: true } };
    const child = buildField(positionalField, { path: [], flags: [] }, defaultInstance);
    root = {
      kind: "group",
      field: { ...child.field, path: [], key: "", flag: "" },
      children: [child],
      assemble: (values) => ({ ok: true, value: values[""] }),
    };
  }

  checkUniqueKeys(root);
  const level = describeParserLevel(root);
  logger.debug("Built parser tree", { leaves: level.leaves.length, choices: level.choices.length });
  return root;
}

/** Every node key that reads flat values must be unique across the whole tree. */
function checkUniqueKeys(root: GroupNode): void {
  const owners = new Map<string, string[]>();
  const visit = (node: ParserNode): void => {
    if (node.kind === "group") {
      node.children.forEach(visit);
      return;
    }
    const names = owners.get(node.field.key) ?? [];
    names.push(node.field.name);
    owners.set(node.field.key, names);
    if (node.kind === "choice") node.variants.forEach(visit);
  };
  visit(root);
  for (const [key, names] of owners) {
    if (names.length > 1) throw new AmbiguousFieldNameError(key, names);
  }
}

function descriptionOf(node: ParserNode): string | undefined {
  if (node.kind !== "group") return undefined;
  if (node.field.doc !== undefined) return node.field.doc;
  return node.field.descriptor.kind === "struct" ? node.field.descriptor.doc : undefined;
}

/**
 * Arguments of one argv scope: the leaves and choices reachable from `node`
 * without entering a subcommand.
 *
 * @throws AmbiguousFieldNameError when two leaves claim the same flag
 */
export function describeParserLevel(node: ParserNode, description?: string): ParserLevel {
  const leaves: LeafArgument[] = [];
  const choices: ChoiceArgument[] = [];
  const visit = (current: ParserNode): void => {
    switch (current.kind) {
      case "leaf":
        if (current.argument) leaves.push(current.argument);
        return;
      case "group":
        current.children.forEach(visit);
        return;
      case "choice":
        choices.push(current.argument);
        return;
    }
  };
  visit(node);

  const claimed = new Map<string, string>();
  const claim = (flag: string, key: string): void => {
    const owner = RESERVED_FLAGS.has(flag) ? "<help>" : claimed.get(flag);
    if (owner !== undefined) throw new AmbiguousFieldNameError(`--${flag}`, [owner, key]);
    claimed.set(flag, key);
  };
  for (const leaf of leaves) {
    if (leaf.flag === undefined) continue;
    claim(leaf.flag, leaf.key);
    if (leaf.booleanFlag) claim(`no-${leaf.flag}`, leaf.key);
  }

  return { leaves, choices, description: description ?? descriptionOf(node) };
}
