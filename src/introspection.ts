import { getIntrospectionQuery } from "graphql";
import { z } from "zod";
import { GraphQLResponseError, InputError } from "./errors.js";
import type {
  IntrospectionEnumValue,
  IntrospectionField,
  IntrospectionInputValue,
  IntrospectionNamedTypeRef,
  IntrospectionQuery,
  IntrospectionType,
  IntrospectionTypeRef,
} from "./types.js";

/**
 * The query sent to live endpoints. Only descriptions are requested beyond
 * the defaults, so older servers without `specifiedByURL` or deprecated
 * input values still answer it.
 */
export const INTROSPECTION_QUERY = getIntrospectionQuery({
  descriptions: true,
  specifiedByUrl: false,
  directiveIsRepeatable: false,
  schemaDescription: false,
  inputValueDeprecation: false,
});

const typeRefSchema: z.ZodType<IntrospectionTypeRef> = z.lazy(() =>
  z.object({
    kind: z.string(),
    name: z.string().nullish(),
    ofType: typeRefSchema.nullish(),
  })
);

const inputValueSchema: z.ZodType<IntrospectionInputValue> = z.object({
  name: z.string(),
  description: z.string().nullish(),
  type: typeRefSchema,
  defaultValue: z.string().nullish(),
});

const fieldSchema: z.ZodType<IntrospectionField> = z.object({
  name: z.string(),
  description: z.string().nullish(),
  args: z.array(inputValueSchema).nullish(),
  type: typeRefSchema,
});

const enumValueSchema: z.ZodType<IntrospectionEnumValue> = z.object({
  name: z.string(),
  description: z.string().nullish(),
});

const namedTypeRefSchema: z.ZodType<IntrospectionNamedTypeRef> = z.object({
  kind: z.string().nullish(),
  name: z.string(),
});

const typeSchema: z.ZodType<IntrospectionType> = z.object({
  kind: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  fields: z.array(fieldSchema).nullish(),
  inputFields: z.array(inputValueSchema).nullish(),
  enumValues: z.array(enumValueSchema).nullish(),
  possibleTypes: z.array(namedTypeRefSchema).nullish(),
});

const rootTypeSchema = z.object({ name: z.string() }).nullish();

const introspectionSchema: z.ZodType<IntrospectionQuery> = z.object({
  __schema: z.object({
    queryType: rootTypeSchema,
    mutationType: rootTypeSchema,
    types: z.array(typeSchema).nullish(),
  }),
});

const responseEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z
    .array(z.object({ message: z.string() }).passthrough())
    .nullish(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function hasSchemaKey(value: unknown): boolean {
  return typeof value === "object" && value !== null && "__schema" in value;
}

/**
 * Accept either a bare `{ __schema }` document or a GraphQL response
 * envelope `{ data, errors }`, and return the validated introspection data.
 *
 * @throws {GraphQLResponseError} when the envelope carries errors
 * @throws {InputError} when no introspection data is present
 */
export function parseIntrospectionResult(raw: unknown): IntrospectionQuery {
  let candidate = raw;

  if (!hasSchemaKey(raw)) {
    const envelope = responseEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new InputError("input is not a GraphQL introspection result");
    }
    const errors = envelope.data.errors ?? [];
    if (errors.length > 0) {
      throw new GraphQLResponseError(errors.map((e) => e.message));
    }
    if (envelope.data.data === undefined || envelope.data.data === null) {
      throw new InputError("no data in response");
    }
    candidate = envelope.data.data;
  }

  const parsed = introspectionSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new InputError(
      `invalid introspection result: ${formatIssues(parsed.error)}`
    );
  }
  return parsed.data;
}
