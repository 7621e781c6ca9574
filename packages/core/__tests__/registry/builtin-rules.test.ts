/**
 * Unit tests for the built-in constructor rules.
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import type { ConstructorSpec } from "@shapeargs/sdk";
import {
  booleanSpec,
  createConstructorRegistry,
  dateSpec,
  integerSpec,
  numberSpec,
  stringSpec,
} from "../../src/registry/index.js";
import { resolveType } from "../../src/resolver/index.js";

function specFor(schema: z.ZodTypeAny): ConstructorSpec {
  return createConstructorRegistry().lookup({ descriptor: resolveType(schema), markers: {} });
}

describe("scalar specs", () => {
  it("strings pass through unchanged", () => {
    expect(stringSpec.instanceFromTokens(["hello world"])).toEqual({ ok: true, value: "hello world" });
    expect(stringSpec.metavar).toBe("STR");
  });

  it("numbers accept floats and reject junk", () => {
    expect(numberSpec.instanceFromTokens(["0.5"])).toEqual({ ok: true, value: 0.5 });
    expect(numberSpec.instanceFromTokens(["abc"])).toEqual({ ok: false, message: '"abc" is not a number' });
    expect(numberSpec.instanceFromTokens([""])).toEqual({ ok: false, message: '"" is not a number' });
  });

  it("integers reject fractions", () => {
    expect(integerSpec.instanceFromTokens(["42"])).toEqual({ ok: true, value: 42 });
    expect(integerSpec.instanceFromTokens(["4.2"])).toEqual({ ok: false, message: '"4.2" is not an integer' });
  });

  it("integers reject values that would lose precision", () => {
    expect(integerSpec.instanceFromTokens(["9007199254740991"])).toEqual({ ok: true, value: 9007199254740991 });
    expect(integerSpec.instanceFromTokens(["9007199254740993"])).toEqual({
      ok: false,
      message: '"9007199254740993" is outside the safe integer range; use z.bigint()',
    });
  });

  it("z.number().int() resolves to the integer spec", () => {
    expect(specFor(z.number().int())).toBe(integerSpec);
    expect(specFor(z.number())).toBe(numberSpec);
  });

  it("bigints parse through BigInt", () => {
    const spec = specFor(z.bigint());
    expect(spec.instanceFromTokens(["12345678901234567890"])).toEqual({
      ok: true,
      value: 12345678901234567890n,
    });
    expect(spec.instanceFromTokens(["1.5"])).toEqual({ ok: false, message: '"1.5" is not an integer' });
  });

  it("bigints reject blank tokens", () => {
    const spec = specFor(z.bigint());

    expect(spec.instanceFromTokens([""])).toEqual({ ok: false, message: '"" is not an integer' });
    expect(spec.instanceFromTokens(["  "])).toEqual({ ok: false, message: '"  " is not an integer' });
  });

  it("booleans take True/False in either case of the first letter", () => {
    expect(booleanSpec.metavar).toBe("{True,False}");
    expect(booleanSpec.choices).toEqual(["True", "False"]);
    expect(booleanSpec.instanceFromTokens(["true"])).toEqual({ ok: true, value: true });
    expect(booleanSpec.instanceFromTokens(["False"])).toEqual({ ok: true, value: false });
    expect(booleanSpec.instanceFromTokens(["yes"])).toEqual({ ok: false, message: '"yes" is not one of True, False' });
    expect(booleanSpec.tokensFromInstance(true)).toEqual(["True"]);
  });

  it("dates round-trip through ISO strings", () => {
    const result = dateSpec.instanceFromTokens(["2024-01-02T03:04:05.000Z"]);
    expect(result.ok && result.value instanceof Date && result.value.getTime()).toBe(Date.UTC(2024, 0, 2, 3, 4, 5));
    expect(dateSpec.tokensFromInstance(new Date(Date.UTC(2024, 0, 2)))).toEqual(["2024-01-02T00:00:00.000Z"]);
    expect(dateSpec.instanceFromTokens(["not a date"])).toEqual({ ok: false, message: '"not a date" is not a date' });
  });

  it("single-token specs refuse several tokens", () => {
    expect(stringSpec.instanceFromTokens(["a", "b"])).toEqual({ ok: false, message: "expected 1 token, got 2" });
  });
});

describe("literalSpec", () => {
  it("maps labels to enum values", () => {
    const spec = specFor(z.enum(["adam", "sgd"]));

    expect(spec.metavar).toBe("{adam,sgd}");
    expect(spec.choices).toEqual(["adam", "sgd"]);
    expect(spec.instanceFromTokens(["sgd"])).toEqual({ ok: true, value: "sgd" });
    expect(spec.instanceFromTokens(["rmsprop"])).toEqual({ ok: false, message: '"rmsprop" is not one of adam, sgd' });
  });

  it("keeps non-string literal values", () => {
    const spec = specFor(z.union([z.literal(1), z.literal(2), z.literal(true)]));

    expect(spec.instanceFromTokens(["2"])).toEqual({ ok: true, value: 2 });
    expect(spec.instanceFromTokens(["true"])).toEqual({ ok: true, value: true });
    expect(spec.tokensFromInstance(1)).toEqual(["1"]);
    expect(spec.accepts("1")).toBe(false);
  });

  it("labels native enums by member name", () => {
    enum Color {
      Red = 1,
      Green = 2,
    }
    const spec = specFor(z.nativeEnum(Color));

    expect(spec.choices).toEqual(["Red", "Green"]);
    expect(spec.instanceFromTokens(["Green"])).toEqual({ ok: true, value: Color.Green });
    expect(spec.tokensFromInstance(Color.Red)).toEqual(["Red"]);
  });
});

describe("optionalSpec", () => {
  it("accepts the null token for nullable fields", () => {
    const spec = specFor(z.number().int().nullable());

    expect(spec.instanceFromTokens(["null"])).toEqual({ ok: true, value: null });
    expect(spec.instanceFromTokens(["3"])).toEqual({ ok: true, value: 3 });
    expect(spec.tokensFromInstance(null)).toEqual(["null"]);
    expect(spec.accepts(null)).toBe(true);
  });

  it("adds null to the choices of a nullable enum", () => {
    expect(specFor(z.enum(["a", "b"]).nullable()).choices).toEqual(["a", "b", "null"]);
  });

  it("delegates to the inner spec for optional fields", () => {
    const spec = specFor(z.string().optional());

    expect(spec.instanceFromTokens(["null"])).toEqual({ ok: true, value: "null" });
    expect(spec.accepts(undefined)).toBe(false);
  });

  it.each<{ label: string; schema: z.ZodTypeAny; value: unknown }>([
    { label: "optional string", schema: z.string().optional(), value: "text" },
    { label: "optional integer", schema: z.number().int().optional(), value: 7 },
    { label: "nullable number (null)", schema: z.number().nullable(), value: null },
    { label: "nullable number", schema: z.number().nullable(), value: 2.5 },
    { label: "nullish enum", schema: z.enum(["a", "b"]).nullish(), value: "b" },
  ])("round-trips an accepted $label", ({ schema, value }) => {
    const spec = specFor(schema);

    expect(spec.accepts(value)).toBe(true);
    expect(spec.instanceFromTokens(spec.tokensFromInstance(value))).toEqual({ ok: true, value });
  });
});

describe("sequenceSpec", () => {
  it("requires at least one token only when the array has a minimum", () => {
    expect(specFor(z.array(z.string())).nargs).toBe("*");
    expect(specFor(z.array(z.string()).nonempty()).nargs).toBe("+");
  });

  it("converts each token with the element spec", () => {
    const spec = specFor(z.array(z.number().int()));

    expect(spec.metavar).toBe("INT");
    expect(spec.instanceFromTokens(["1", "2", "3"])).toEqual({ ok: true, value: [1, 2, 3] });
    expect(spec.instanceFromTokens(["1", "x"])).toEqual({ ok: false, message: '"x" is not an integer' });
    expect(spec.tokensFromInstance([4, 5])).toEqual(["4", "5"]);
  });

  it("enforces the declared minimum length", () => {
    const spec = specFor(z.array(z.string()).min(2));

    expect(spec.instanceFromTokens(["a"])).toEqual({ ok: false, message: "expected at least 2 values, got 1" });
  });

  it("chunks tokens for tuple elements", () => {
    const spec = specFor(z.array(z.tuple([z.string(), z.number().int()])));

    expect(spec.metavar).toBe("STR INT");
    expect(spec.instanceFromTokens(["a", "1", "b", "2"])).toEqual({
      ok: true,
      value: [
        ["a", 1],
        ["b", 2],
      ],
    });
    expect(spec.instanceFromTokens(["a", "1", "b"])).toEqual({
      ok: false,
      message: "expected a multiple of 2 tokens, got 3",
    });
  });

  it("builds sets for z.set", () => {
    const spec = specFor(z.set(z.string()));
    const result = spec.instanceFromTokens(["a", "b", "a"]);

    expect(result).toEqual({ ok: true, value: new Set(["a", "b"]) });
    expect(spec.accepts(new Set(["x"]))).toBe(true);
    expect(spec.accepts(["x"])).toBe(false);
  });

  it("does not apply to elements of variable width", () => {
    const registry = createConstructorRegistry();
    const descriptor = resolveType(z.array(z.array(z.string())));

    expect(() => registry.lookup({ descriptor, markers: {} }, "matrix")).toThrow(
      "No constructor rule matches array<array<string>> at matrix",
    );
  });
});

describe("tupleSpec", () => {
  it("sums the element widths", () => {
    const spec = specFor(z.tuple([z.string(), z.number().int(), z.boolean()]));

    expect(spec.nargs).toBe(3);
    expect(spec.metavar).toBe("STR INT {True,False}");
    expect(spec.instanceFromTokens(["x", "2", "False"])).toEqual({ ok: true, value: ["x", 2, false] });
    expect(spec.instanceFromTokens(["x", "2"])).toEqual({ ok: false, message: "expected 3 tokens, got 2" });
    expect(spec.tokensFromInstance(["y", 7, true])).toEqual(["y", "7", "True"]);
  });

  it("takes any number of trailing rest elements", () => {
    const spec = specFor(z.tuple([z.string()]).rest(z.number().int()));

    expect(spec.nargs).toBe("+");
    expect(spec.metavar).toBe("STR [INT ...]");
    expect(spec.instanceFromTokens(["name", "1", "2"])).toEqual({ ok: true, value: ["name", 1, 2] });
    expect(spec.instanceFromTokens([])).toEqual({ ok: false, message: "expected at least 1 tokens, got 0" });
  });
});

describe("mappingSpec", () => {
  it("reads key/value pairs into a record", () => {
    const spec = specFor(z.record(z.string(), z.number().int()));

    expect(spec.nargs).toBe("*");
    expect(spec.metavar).toBe("STR INT");
    expect(spec.instanceFromTokens(["a", "1", "b", "2"])).toEqual({ ok: true, value: { a: 1, b: 2 } });
    expect(spec.instanceFromTokens(["a"])).toEqual({ ok: false, message: "expected key/value pairs, got 1 tokens" });
    expect(spec.tokensFromInstance({ x: 3 })).toEqual(["x", "3"]);
  });

  it("builds a Map for z.map", () => {
    const spec = specFor(z.map(z.number().int(), z.string()));

    expect(spec.instanceFromTokens(["1", "one"])).toEqual({ ok: true, value: new Map([[1, "one"]]) });
    expect(spec.accepts(new Map([[2, "two"]]))).toBe(true);
    expect(spec.accepts(new Map([["2", "two"]]))).toBe(false);
  });
});

describe("alternativesSpec", () => {
  it("tries members in declared order", () => {
    const spec = specFor(z.union([z.number().int(), z.string()]));

    expect(spec.nargs).toBe(1);
    expect(spec.metavar).toBe("INT|STR");
    expect(spec.instanceFromTokens(["5"])).toEqual({ ok: true, value: 5 });
    expect(spec.instanceFromTokens(["five"])).toEqual({ ok: true, value: "five" });
  });

  it("reports when no member converts", () => {
    const spec = specFor(z.union([z.number().int(), z.boolean()]));

    expect(spec.instanceFromTokens(["maybe"])).toEqual({
      ok: false,
      message: '"maybe" matches none of INT|{True,False}',
    });
  });

  it("merges choices when every member has them", () => {
    const spec = specFor(z.union([z.boolean(), z.enum(["auto"])]));

    expect(spec.metavar).toBe("{True,False,auto}");
    expect(spec.instanceFromTokens(["auto"])).toEqual({ ok: true, value: "auto" });
  });

  it("skips members whose width does not match", () => {
    const spec = specFor(z.union([z.tuple([z.number().int(), z.number().int()]), z.number().int()]));

    expect(spec.nargs).toBe("+");
    expect(spec.instanceFromTokens(["3"])).toEqual({ ok: true, value: 3 });
    expect(spec.instanceFromTokens(["3", "4"])).toEqual({ ok: true, value: [3, 4] });
  });

  it("formats with the first member that accepts the value", () => {
    const spec = specFor(z.union([z.number().int(), z.string()]));

    expect(spec.tokensFromInstance("x")).toEqual(["x"]);
    expect(spec.tokensFromInstance(8)).toEqual(["8"]);
  });
});
