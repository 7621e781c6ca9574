import { describe, it, expect } from "vitest";
import { z } from "zod";
import { isTypeDescriptor, defaultOf, REQUIRED, MISSING } from "../descriptor.js";
import { converted, conversionFailed } from "../constructor.js";

describe("descriptor helpers", () => {
  describe("isTypeDescriptor", () => {
    it("recognizes descriptors", () => {
      expect(isTypeDescriptor({ kind: "literal", options: [] })).toBe(true);
    });

    it("rejects zod schemas and unrelated objects", () => {
      expect(isTypeDescriptor(z.string())).toBe(false);
      expect(isTypeDescriptor({ kind: "tool" })).toBe(false);
      expect(isTypeDescriptor(null)).toBe(false);
    });
  });

  describe("field defaults", () => {
    it("defaultOf wraps the value", () => {
      expect(defaultOf(3)).toEqual({ kind: "value", value: 3 });
      expect(defaultOf(undefined)).toEqual({ kind: "value", value: undefined });
    });

    it("REQUIRED and MISSING are distinct kinds", () => {
      expect(REQUIRED.kind).toBe("required");
      expect(MISSING.kind).toBe("missing");
    });
  });

  describe("conversion results", () => {
    it("converted carries the value", () => {
      expect(converted(5)).toEqual({ ok: true, value: 5 });
    });

    it("conversionFailed carries the message", () => {
      expect(conversionFailed("nope")).toEqual({ ok: false, message: "nope" });
    });
  });
});
