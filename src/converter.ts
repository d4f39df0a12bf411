import { resolveOptions } from "./options.js";
import { buildType } from "./type-builder.js";
import type {
  ConversionOptions,
  IntrospectionQuery,
  IntrospectionType,
  SchemaDocument,
} from "./types.js";

export const JSON_SCHEMA_DRAFT_06 = "http://json-schema.org/draft-06/schema#";

const ROOT_PROPERTY_NAMES = ["Query", "Mutation"];
const INTERNAL_PREFIX = "__";

export function findType(
  types: readonly IntrospectionType[],
  name: string | undefined
): IntrospectionType | undefined {
  if (name === undefined) return undefined;
  return types.find((t) => t.name === name);
}

export function isInternalType(type: IntrospectionType): boolean {
  return type.name.startsWith(INTERNAL_PREFIX);
}

/**
 * Convert an introspection result into a Draft-06 JSON Schema with the query
 * and mutation roots under `properties` and every other named type under
 * `definitions`.
 *
 * @throws {InvalidOptionError} when `options.idTypeMapping` is not recognised
 */
export function convert(
  introspection: IntrospectionQuery,
  options?: Partial<ConversionOptions>
): SchemaDocument {
  const opts = resolveOptions(options);
  const schema = introspection.__schema;
  const types = schema.types ?? [];

  const result: SchemaDocument = {
    $schema: JSON_SCHEMA_DRAFT_06,
    properties: {},
    definitions: {},
  };

  // Roots are looked up in the unfiltered list.
  const queryName = schema.queryType?.name;
  const mutationName = schema.mutationType?.name;

  const queryType = findType(types, queryName);
  if (queryType) {
    result.properties.Query = buildType(queryType, opts);
  }

  const mutationType = findType(types, mutationName);
  if (mutationType) {
    result.properties.Mutation = buildType(mutationType, opts);
  }

  // Roots live under `properties`, whether named conventionally or not.
  const rootNames = new Set<string | undefined>([...ROOT_PROPERTY_NAMES, queryName, mutationName]);

  for (const type of types) {
    if (opts.ignoreInternals && isInternalType(type)) continue;
    if (rootNames.has(type.name)) continue;
    // First declaration of a duplicated name wins.
    if (Object.hasOwn(result.definitions, type.name)) continue;
    result.definitions[type.name] = buildType(type, opts);
  }

  return result;
}
