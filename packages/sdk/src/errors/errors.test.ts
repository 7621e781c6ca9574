import { describe, it, expect } from "vitest";
import {
  ShapeArgsError,
  StructuralError,
  InputError,
  UnresolvedGenericError,
  UnsupportedUnionShapeError,
  CyclicTypeError,
  AmbiguousFieldNameError,
  NoMatchingRuleError,
  ConfigError,
  InternalInconsistencyError,
  MissingRequiredArgumentError,
  ConversionError,
  InstantiationError,
  ArgumentSyntaxError,
} from "./base.js";
import { ErrorCode } from "./codes.js";

describe("Error System", () => {
  describe("ShapeArgsError", () => {
    it("should preserve cause when provided", () => {
      const rootCause = new Error("root cause");
      const err = new ShapeArgsError("test error", "TEST_CODE", { cause: rootCause });
      expect(err.cause).toBe(rootCause);
      expect(err.code).toBe("TEST_CODE");
      expect(err.message).toBe("test error");
    });

    it("should work without cause", () => {
      const err = new ShapeArgsError("test error", "TEST_CODE");
      expect(err.cause).toBeUndefined();
      expect(err.name).toBe("ShapeArgsError");
    });
  });

  describe("structural errors", () => {
    it("UnresolvedGenericError names the variable and the position", () => {
      const err = new UnresolvedGenericError("T", "box.value");
      expect(err.name).toBe("UnresolvedGenericError");
      expect(err.code).toBe(ErrorCode.UNRESOLVED_GENERIC);
      expect(err.typeVar).toBe("T");
      expect(err.message).toBe(
        'Type variable "T" at box.value has no binding and no default to infer it from',
      );
      expect(err).toBeInstanceOf(StructuralError);
    });

    it("renders the root position as <root>", () => {
      const err = new UnsupportedUnionShapeError("", "mixes records and primitives");
      expect(err.message).toBe("Unsupported union at <root>: mixes records and primitives");
      expect(err.code).toBe(ErrorCode.UNSUPPORTED_UNION_SHAPE);
    });

    it("CyclicTypeError has its own code", () => {
      const err = new CyclicTypeError("node.next", "ZodLazy");
      expect(err.code).toBe(ErrorCode.CYCLIC_TYPE);
      expect(err.where).toBe("node.next");
      expect(err.message).toContain("refers to itself");
    });

    it("AmbiguousFieldNameError lists every colliding path", () => {
      const err = new AmbiguousFieldNameError("--lr", ["lr", "optim.lr"]);
      expect(err.paths).toEqual(["lr", "optim.lr"]);
      expect(err.message).toBe('Argument name "--lr" is produced by more than one field: lr, optim.lr');
    });

    it("NoMatchingRuleError points at the field", () => {
      const err = new NoMatchingRuleError("x", "mapping<string, unknown>");
      expect(err.code).toBe(ErrorCode.NO_MATCHING_RULE);
      expect(err.message).toContain("mapping<string, unknown> at x");
    });

    it("ConfigError and InternalInconsistencyError are structural", () => {
      expect(new ConfigError("bad options")).toBeInstanceOf(StructuralError);
      const leftover = new InternalInconsistencyError(["a", "b.c"]);
      expect(leftover).toBeInstanceOf(StructuralError);
      expect(leftover.message).toBe("Parsed values were not consumed by any argument: a, b.c");
    });
  });

  describe("input errors", () => {
    it("MissingRequiredArgumentError carries the path", () => {
      const err = new MissingRequiredArgumentError("model.lr", "--model.lr");
      expect(err).toBeInstanceOf(InputError);
      expect(err.path).toBe("model.lr");
      expect(err.message).toBe("Missing required argument: --model.lr");
      expect(err.code).toBe(ErrorCode.MISSING_REQUIRED_ARGUMENT);
    });

    it("ConversionError keeps raw tokens and cause", () => {
      const cause = new SyntaxError("Unexpected token");
      const err = new ConversionError("x", "--x", ["{oops"], "not valid JSON", { cause });
      expect(err.rawTokens).toEqual(["{oops"]);
      expect(err.cause).toBe(cause);
      expect(err.message).toBe('Invalid value for --x: ["{oops"]: not valid JSON');
    });

    it("InstantiationError mentions the group path", () => {
      expect(new InstantiationError("model", "lr: too small").message).toBe(
        "Could not build model: lr: too small",
      );
      expect(new InstantiationError("", "bad").message).toBe("Could not build value: bad");
    });

    it("ArgumentSyntaxError defaults to the root path", () => {
      const err = new ArgumentSyntaxError("unrecognized arguments: --zzz");
      expect(err.path).toBe("");
      expect(err).toBeInstanceOf(ShapeArgsError);
    });
  });
});
