import type { IdTypeMapping, JsonSchemaNode, JsonSchemaTypeName } from "./types.js";

export const ID_DESCRIPTION =
  "The `ID` scalar type represents a unique identifier, often used to refetch an object or as key for a cache. The ID type appears in a JSON response as a String; however, it is not intended to be human-readable. When expected as an input type, any string (such as `\"4\"`) or integer (such as `4`) input value will be accepted as an ID.";

export const STRING_DESCRIPTION =
  "The `String` scalar type represents textual data, represented as UTF-8 character sequences. The String type is most often used by GraphQL to represent free-form human-readable text.";

export const BOOLEAN_DESCRIPTION =
  "The `Boolean` scalar type represents `true` or `false`.";

function idType(mapping: IdTypeMapping): JsonSchemaTypeName | JsonSchemaTypeName[] {
  switch (mapping) {
    case "number":
      return "number";
    case "both":
      return ["string", "number"];
    default:
      return "string";
  }
}

/**
 * Map a scalar name to a JSON Schema leaf. Every leaf is titled with the
 * scalar's name, built-ins included, matching the output of the tool this
 * converter replaces. Custom scalars get a bare `{ title }` node with no
 * `type`.
 */
export function mapScalar(name: string, idTypeMapping: IdTypeMapping): JsonSchemaNode {
  switch (name) {
    case "ID":
      return { type: idType(idTypeMapping), title: name, description: ID_DESCRIPTION };
    case "String":
      return { type: "string", title: name, description: STRING_DESCRIPTION };
    case "Int":
    case "Float":
      return { type: "number", title: name };
    case "Boolean":
      return { type: "boolean", title: name, description: BOOLEAN_DESCRIPTION };
    default:
      return { title: name };
  }
}
