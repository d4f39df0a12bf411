export const ID_TYPE_MAPPINGS = ["string", "number", "both"] as const;

export type IdTypeMapping = (typeof ID_TYPE_MAPPINGS)[number];

export interface ConversionOptions {
  /** Drop `__`-prefixed introspection types from `definitions`. */
  ignoreInternals: boolean;
  /** Emit `anyOf [item, null]` for list elements that are nullable in GraphQL. */
  nullableArrayItems: boolean;
  idTypeMapping: IdTypeMapping;
}

// --- Introspection input ---

export interface IntrospectionTypeRef {
  kind: string;
  name?: string | null;
  ofType?: IntrospectionTypeRef | null;
}

export interface IntrospectionInputValue {
  name: string;
  description?: string | null;
  type: IntrospectionTypeRef;
  /** GraphQL literal as text, e.g. `"10"` or `"\"desc\""`. */
  defaultValue?: string | null;
}

export interface IntrospectionField {
  name: string;
  description?: string | null;
  args?: IntrospectionInputValue[] | null;
  type: IntrospectionTypeRef;
}

export interface IntrospectionEnumValue {
  name: string;
  description?: string | null;
}

export interface IntrospectionNamedTypeRef {
  kind?: string | null;
  name: string;
}

export interface IntrospectionType {
  kind: string;
  name: string;
  description?: string | null;
  fields?: IntrospectionField[] | null;
  inputFields?: IntrospectionInputValue[] | null;
  enumValues?: IntrospectionEnumValue[] | null;
  possibleTypes?: IntrospectionNamedTypeRef[] | null;
}

export interface IntrospectionSchema {
  queryType?: { name: string } | null;
  mutationType?: { name: string } | null;
  types?: IntrospectionType[] | null;
}

export interface IntrospectionQuery {
  __schema: IntrospectionSchema;
}

// --- JSON Schema output ---

export type JsonSchemaTypeName =
  | "object"
  | "array"
  | "string"
  | "number"
  | "boolean"
  | "null";

export interface JsonSchemaNode {
  type?: JsonSchemaTypeName | JsonSchemaTypeName[];
  properties?: Record<string, JsonSchemaNode>;
  items?: JsonSchemaNode;
  $ref?: string;
  required?: string[];
  anyOf?: JsonSchemaNode[];
  oneOf?: JsonSchemaNode[];
  title?: string;
  description?: string;
  default?: unknown;
  enum?: string[];
}

export interface SchemaDocument {
  $schema: string;
  properties: Record<string, JsonSchemaNode>;
  definitions: Record<string, JsonSchemaNode>;
}
