import { InvalidOptionError } from "./errors.js";
import { ID_TYPE_MAPPINGS } from "./types.js";
import type { ConversionOptions, IdTypeMapping } from "./types.js";

export const DEFAULT_OPTIONS: Readonly<ConversionOptions> = {
  ignoreInternals: true,
  nullableArrayItems: false,
  idTypeMapping: "string",
};

export function isIdTypeMapping(value: unknown): value is IdTypeMapping {
  return ID_TYPE_MAPPINGS.some((mapping) => mapping === value);
}

/**
 * Fill in defaults for a partial options record. Callers outside the type
 * system (config files, plain JS) may pass any string as `idTypeMapping`,
 * so it is checked here rather than trusted.
 */
export function resolveOptions(
  options?: Partial<ConversionOptions>
): ConversionOptions {
  const idTypeMapping: unknown =
    options?.idTypeMapping ?? DEFAULT_OPTIONS.idTypeMapping;
  if (!isIdTypeMapping(idTypeMapping)) {
    throw new InvalidOptionError(
      `invalid id-type mapping: ${String(idTypeMapping)} (expected ${ID_TYPE_MAPPINGS.join(", ")})`,
      "idTypeMapping",
      idTypeMapping
    );
  }

  return {
    ignoreInternals: options?.ignoreInternals ?? DEFAULT_OPTIONS.ignoreInternals,
    nullableArrayItems:
      options?.nullableArrayItems ?? DEFAULT_OPTIONS.nullableArrayItems,
    idTypeMapping,
  };
}
