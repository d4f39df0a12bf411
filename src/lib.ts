export { convert, findType, isInternalType, JSON_SCHEMA_DRAFT_06 } from "./converter.js";
export { buildType, buildField, buildInputValue } from "./type-builder.js";
export { resolveTypeRef, isRequired, definitionRef } from "./type-resolver.js";
export { mapScalar } from "./scalar-mapper.js";
export { DEFAULT_OPTIONS, resolveOptions, isIdTypeMapping } from "./options.js";
export { parseIntrospectionResult, INTROSPECTION_QUERY } from "./introspection.js";
export { fetchIntrospection } from "./api-client.js";
export type { FetchIntrospectionOptions } from "./api-client.js";
export type { BackoffPolicy } from "./retry.js";
export {
  ApiError,
  ConfigError,
  GraphQLResponseError,
  InputError,
  InvalidOptionError,
} from "./errors.js";
export { ID_TYPE_MAPPINGS } from "./types.js";
export type {
  ConversionOptions,
  IdTypeMapping,
  IntrospectionQuery,
  IntrospectionSchema,
  IntrospectionType,
  IntrospectionField,
  IntrospectionInputValue,
  IntrospectionEnumValue,
  IntrospectionTypeRef,
  JsonSchemaNode,
  JsonSchemaTypeName,
  SchemaDocument,
} from "./types.js";
