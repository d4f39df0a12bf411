import { definitionRef, isRequired, resolveTypeRef } from "./type-resolver.js";
import type {
  ConversionOptions,
  IntrospectionField,
  IntrospectionInputValue,
  IntrospectionType,
  IntrospectionTypeRef,
  JsonSchemaNode,
} from "./types.js";

interface Member {
  name: string;
  type: IntrospectionTypeRef;
}

/**
 * Build `properties` and `required` for a list of fields or input values and
 * attach them to `node`. Empty maps and lists are left off.
 */
function attachMembers<T extends Member>(
  node: JsonSchemaNode,
  members: readonly T[],
  build: (member: T) => JsonSchemaNode
): JsonSchemaNode {
  const properties: Record<string, JsonSchemaNode> = {};
  const required: string[] = [];

  for (const member of members) {
    properties[member.name] = build(member);
    if (isRequired(member.type)) {
      required.push(member.name);
    }
  }

  if (members.length > 0) node.properties = properties;
  if (required.length > 0) node.required = required;
  return node;
}

function objectNode(description?: string | null): JsonSchemaNode {
  const node: JsonSchemaNode = { type: "object" };
  if (description) node.description = description;
  return node;
}

/**
 * Argument or input field: the resolved type with the value's own
 * description and, when the literal is JSON, its default.
 */
export function buildInputValue(
  input: IntrospectionInputValue,
  options: ConversionOptions
): JsonSchemaNode {
  const node = resolveTypeRef(input.type, options);

  if (input.description) {
    node.description = input.description;
  } else {
    delete node.description;
  }

  if (input.defaultValue != null) {
    // GraphQL literals that are not JSON (enum values, input objects with
    // bare keys) are left without a default.
    try {
      const parsed: unknown = JSON.parse(input.defaultValue);
      if (parsed !== null) node.default = parsed;
    } catch {
      // not a JSON literal
    }
  }

  return node;
}

/**
 * A field is described as a call: `arguments` takes the argument object,
 * `return` is the value it produces.
 */
export function buildField(
  field: IntrospectionField,
  options: ConversionOptions
): JsonSchemaNode {
  const node = objectNode(field.description);
  const args = attachMembers({ type: "object" }, field.args ?? [], (arg) =>
    buildInputValue(arg, options)
  );

  node.properties = {
    return: resolveTypeRef(field.type, options),
    arguments: args,
  };
  return node;
}

export function buildType(
  type: IntrospectionType,
  options: ConversionOptions
): JsonSchemaNode {
  const node = objectNode(type.description);

  switch (type.kind) {
    case "OBJECT":
    case "INTERFACE":
      return attachMembers(node, type.fields ?? [], (field) =>
        buildField(field, options)
      );

    case "INPUT_OBJECT":
      return attachMembers(node, type.inputFields ?? [], (field) =>
        buildInputValue(field, options)
      );

    case "ENUM":
      node.type = "string";
      node.anyOf = (type.enumValues ?? []).map((value) => {
        const member: JsonSchemaNode = { enum: [value.name] };
        if (value.description) {
          member.title = value.description;
          member.description = value.description;
        }
        return member;
      });
      return node;

    case "UNION":
      delete node.type;
      node.oneOf = (type.possibleTypes ?? []).map((possible) =>
        definitionRef(possible.name)
      );
      return node;

    default:
      return node;
  }
}
