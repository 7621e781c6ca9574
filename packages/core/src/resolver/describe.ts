import type { TypeDescriptor } from "@shapeargs/sdk";

/** Short human-readable rendering of a descriptor for error messages. */
export function describeType(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case "primitive":
      return descriptor.name === "opaque" ? descriptor.typeName : descriptor.name;
    case "optional":
      return `${describeType(descriptor.inner)} | ${descriptor.absent === null ? "null" : "undefined"}`;
    case "sequence":
      return `${descriptor.container}<${describeType(descriptor.element)}>`;
    case "tuple": {
      const items = descriptor.elements.map(describeType);
      if (descriptor.rest) items.push(`...${describeType(descriptor.rest)}[]`);
      return `[${items.join(", ")}]`;
    }
    case "mapping":
      return `${descriptor.container}<${describeType(descriptor.key)}, ${describeType(descriptor.value)}>`;
    case "literal":
      return `literal{${descriptor.options.map((option) => option.label).join(",")}}`;
    case "struct":
      return `object{${descriptor.fields.map((field) => field.name).join(",")}}`;
    case "union":
      return descriptor.variants.map((variant) => variant.name).join(" | ");
    case "alternatives":
      return descriptor.members.map(describeType).join(" | ");
  }
}
