/**
 * ConstructorRegistry: maps leaf type positions to constructor specs.
 *
 * Lookup order is the field's own `constructorSpec` marker, then user rules
 * in registration order, then the built-in rules. Rules registered inside
 * `scope()` are dropped when the scope exits, even when it throws.
 */

import { NoMatchingRuleError } from "@shapeargs/sdk";
import type { ConstructorSpec, PrimitiveRule, PrimitiveTypeInfo, SpecLookup } from "@shapeargs/sdk";
import { createLogger } from "@shapeargs/shared";
import { describeType } from "../resolver/describe.js";
import { BUILTIN_RULES } from "./builtin-rules.js";

const logger = createLogger("ConstructorRegistry");

export interface ConstructorRegistry {
  /** Add a rule to the innermost scope. */
  primitiveRule(rule: PrimitiveRule): void;
  /** Run `fn` with a fresh rule scope on top of the current ones. */
  scope<T>(fn: () => T): T;
  /**
   * @param where Tree key reported when nothing matches.
   * @throws NoMatchingRuleError
   */
  lookup(info: PrimitiveTypeInfo, where?: string): ConstructorSpec;
  /** Number of open scopes, the base scope included. */
  readonly depth: number;
}

export function createConstructorRegistry(): ConstructorRegistry {
  const scopes: PrimitiveRule[][] = [[]];

  function lookup(info: PrimitiveTypeInfo, where = ""): ConstructorSpec {
    if (info.markers.constructorSpec) return info.markers.constructorSpec;

    const nested: SpecLookup = (descriptor) => lookup({ descriptor, markers: {} }, where);
    for (const rule of [...scopes.flat(), ...BUILTIN_RULES]) {
      const spec = rule(info, nested);
      if (spec) return spec;
    }
    throw new NoMatchingRuleError(where, describeType(info.descriptor));
  }

  return {
    primitiveRule(rule: PrimitiveRule): void {
      scopes[scopes.length - 1].push(rule);
      logger.debug("Registered primitive rule", { depth: scopes.length, rules: scopes.flat().length });
    },

    scope<T>(fn: () => T): T {
      scopes.push([]);
      logger.debug("Entered rule scope", { depth: scopes.length });
      try {
        return fn();
      } finally {
        scopes.pop();
        logger.debug("Left rule scope", { depth: scopes.length });
      }
    },

    lookup,

    get depth(): number {
      return scopes.length;
    },
  };
}
