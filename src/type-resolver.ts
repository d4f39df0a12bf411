import { mapScalar } from "./scalar-mapper.js";
import type { ConversionOptions, IntrospectionTypeRef, JsonSchemaNode } from "./types.js";

export const DEFINITIONS_PREFIX = "#/definitions/";

export function definitionRef(name: string): JsonSchemaNode {
  return { $ref: `${DEFINITIONS_PREFIX}${name}` };
}

/**
 * Only the outermost wrapper decides requiredness: `[String!]` is an
 * optional list of required items, `[String!]!` a required one.
 */
export function isRequired(ref: IntrospectionTypeRef): boolean {
  return ref.kind === "NON_NULL";
}

/**
 * Unwrap a NON_NULL/LIST chain into a JSON Schema node. Named non-scalar
 * types become `$ref`s into `definitions`; a broken chain yields `{}`.
 */
export function resolveTypeRef(
  ref: IntrospectionTypeRef,
  options: ConversionOptions
): JsonSchemaNode {
  switch (ref.kind) {
    case "NON_NULL":
      // Nullability shows up in the parent's `required` list, not here.
      return ref.ofType ? resolveTypeRef(ref.ofType, options) : {};

    case "LIST": {
      if (!ref.ofType) return { type: "array" };
      const items = resolveTypeRef(ref.ofType, options);
      if (options.nullableArrayItems && !isRequired(ref.ofType)) {
        return { type: "array", items: { anyOf: [items, { type: "null" }] } };
      }
      return { type: "array", items };
    }

    case "SCALAR":
      return ref.name ? mapScalar(ref.name, options.idTypeMapping) : {};

    default:
      return ref.name ? definitionRef(ref.name) : {};
  }
}
