/**
 * Builds one record from its already-built children.
 *
 * Nested records and unions arrive as finished values, so the object schema
 * is extended to pass those keys through untouched; the refinements and
 * transforms wrapped around the object are then re-applied on top. Every
 * schema layer therefore runs exactly once per value. Keys the resolver left
 * out of the record (class-level constants) are omitted from the object.
 */

import { z } from "zod";
import type { AssemblyResult, StructDescriptor } from "@shapeargs/sdk";
import { formatZodError } from "@shapeargs/shared";

/** Object schema reached from `schema` plus the effects wrapped around it, outermost first. */
function splitEffects(schema: z.ZodTypeAny): { object?: z.AnyZodObject; effects: z.ZodEffects<z.ZodTypeAny>[] } {
  const effects: z.ZodEffects<z.ZodTypeAny>[] = [];
  let current: z.ZodTypeAny = schema;
  for (;;) {
    if (current instanceof z.ZodObject) return { object: current, effects };
    if (current instanceof z.ZodEffects) {
      effects.push(current);
      current = current.innerType();
    } else if (current instanceof z.ZodLazy) {
      current = current.schema;
    } else if (current instanceof z.ZodDefault) {
      current = current.removeDefault();
    } else if (current instanceof z.ZodBranded || current instanceof z.ZodReadonly) {
      current = current.unwrap();
    } else if (current instanceof z.ZodCatch) {
      current = current.removeCatch();
    } else if (current instanceof z.ZodPipeline) {
      current = current._def.in;
    } else {
      return { effects };
    }
  }
}

export type Assembler = (values: Record<string, unknown>) => AssemblyResult;

/**
 * @param passthrough Keys whose values are built by child groups or choices.
 */
export function createStructAssembler(struct: StructDescriptor, passthrough: readonly string[]): Assembler {
  const { object, effects } = splitEffects(struct.schema);
  const record = object ?? struct.objectSchema;
  const fieldNames = new Set(struct.fields.map((field) => field.name));
  const excluded: Record<string, true> = {};
  for (const key of Object.keys(record.shape)) {
    if (!fieldNames.has(key)) excluded[key] = true;
  }
  const base = Object.keys(excluded).length > 0 ? record.omit(excluded) : record;
  const overrides: Record<string, z.ZodTypeAny> = {};
  for (const name of passthrough) overrides[name] = z.any();

  let schema: z.ZodTypeAny = passthrough.length > 0 ? base.extend(overrides) : base;
  for (const layer of [...effects].reverse()) {
    schema = new z.ZodEffects({ ...layer._def, schema });
  }

  return (values) => {
    const result = schema.safeParse(values);
    if (result.success) return { ok: true, value: result.data };
    return {
      ok: false,
      message: formatZodError(result.error),
      cause: result.error,
    };
  };
}
