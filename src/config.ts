import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_OPTIONS, isIdTypeMapping } from "./options.js";
import { ID_TYPE_MAPPINGS } from "./types.js";
import type { ConversionOptions } from "./types.js";

export const CONFIG_FILE_NAME = ".gql2jsonschema.yaml";
export const ENV_PREFIX = "GRAPHQL2JSON_";

const DEFAULT_TIMEOUT_SECONDS = 30;
const DEFAULT_RETRIES = 3;

export interface CliConfig {
  help: boolean;
  input?: string;
  output?: string;
  endpoint?: string;
  headers: Record<string, string>;
  timeoutMs: number;
  retries: number;
  logPath?: string;
  configFile?: string;
  options: ConversionOptions;
}

export interface LoadConfigOptions {
  /** Directory searched for the default config file. */
  homeDir?: string;
}

export const USAGE = `Usage: gql2jsonschema [--endpoint <url> | --input <file>] [options]

Converts a GraphQL introspection result to JSON Schema (Draft-06).
Input is read from, in order: --endpoint, --input, or stdin.

Input:
  -e, --endpoint <url>        GraphQL endpoint to introspect
  -H, --header "Key: Value"   HTTP header for the endpoint (repeatable)
                              Supports \${ENV_VAR} interpolation in values
  -t, --timeout <seconds>     HTTP timeout per attempt (default 30)
      --retries <n>           Retries for 429/5xx and network errors (default 3)
  -i, --input <file>          File with an introspection query result

Output:
  -o, --output <file>         Write the schema here (default stdout)

Conversion:
      --ignore-internals[=bool]      Drop __-prefixed types (default true)
      --nullable-array-items[=bool]  Allow null for nullable list items (default false)
      --id-type <mapping>            ID as string, number, or both (default string)

Other:
      --config <file>         YAML config file (default $HOME/${CONFIG_FILE_NAME})
      --log <file>            Append HTTP exchanges to an NDJSON log
  -h, --help                  Show this help

Every setting except headers can also be given as an environment variable,
e.g. ${ENV_PREFIX}ENDPOINT or ${ENV_PREFIX}ID_TYPE.`;

type FlagKind = "string" | "boolean" | "list";

interface FlagSpec {
  key: string;
  kind: FlagKind;
  short?: string;
}

const FLAGS: FlagSpec[] = [
  { key: "config", kind: "string" },
  { key: "input", kind: "string", short: "-i" },
  { key: "output", kind: "string", short: "-o" },
  { key: "endpoint", kind: "string", short: "-e" },
  { key: "header", kind: "list", short: "-H" },
  { key: "timeout", kind: "string", short: "-t" },
  { key: "retries", kind: "string" },
  { key: "ignore-internals", kind: "boolean" },
  { key: "nullable-array-items", kind: "boolean" },
  { key: "id-type", kind: "string" },
  { key: "log", kind: "string" },
  { key: "help", kind: "boolean", short: "-h" },
];

export interface ParsedArgs {
  values: Record<string, string>;
  lists: Record<string, string[]>;
}

function findFlag(token: string): FlagSpec | undefined {
  return FLAGS.find((f) => token === `--${f.key}` || token === f.short);
}

/**
 * Split argv into flag values. Accepts `--flag value`, `--flag=value` and
 * short aliases; boolean flags given bare mean "true".
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const values: Record<string, string> = {};
  const lists: Record<string, string[]> = {};

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const eqIdx = token.startsWith("--") ? token.indexOf("=") : -1;
    const name = eqIdx === -1 ? token : token.slice(0, eqIdx);
    const spec = findFlag(name);
    if (!spec) {
      throw new ConfigError(`unknown argument "${token}"`);
    }

    let value: string;
    if (eqIdx !== -1) {
      value = token.slice(eqIdx + 1);
    } else if (spec.kind === "boolean") {
      value = "true";
    } else {
      const next = argv[i + 1];
      if (next === undefined) {
        throw new ConfigError(`flag ${name} needs a value`);
      }
      value = next;
      i++;
    }

    if (spec.kind === "list") {
      (lists[spec.key] ??= []).push(value);
    } else {
      values[spec.key] = value;
    }
  }

  return { values, lists };
}

const fileConfigSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  endpoint: z.string().optional(),
  headers: z.array(z.string()).optional(),
  timeout: z.number().positive().optional(),
  retries: z.number().int().nonnegative().optional(),
  "ignore-internals": z.boolean().optional(),
  "nullable-array-items": z.boolean().optional(),
  "id-type": z.enum(ID_TYPE_MAPPINGS).optional(),
  log: z.string().optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

export function parseConfigFile(path: string): FileConfig {
  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `error reading config file ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  // An empty file loads as undefined
  if (raw === undefined || raw === null) return {};

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid config file ${path}: ${details}`);
  }
  return parsed.data;
}

export function interpolateEnv(
  value: string,
  env: Record<string, string | undefined>
): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    const envValue = env[varName];
    if (envValue === undefined) {
      throw new ConfigError(`Environment variable ${varName} is not set`);
    }
    return envValue;
  });
}

export function parseHeaders(
  raw: readonly string[],
  env: Record<string, string | undefined>
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const entry of raw) {
    const colonIdx = entry.indexOf(":");
    if (colonIdx === -1) {
      throw new ConfigError(`Invalid header format "${entry}". Expected "Key: Value"`);
    }
    const key = entry.slice(0, colonIdx).trim();
    if (!key) {
      throw new ConfigError(`Invalid header format "${entry}". Header name is empty`);
    }
    headers[key] = interpolateEnv(entry.slice(colonIdx + 1).trim(), env);
  }
  return headers;
}

function parseBoolean(value: string, source: string): boolean {
  switch (value.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new ConfigError(`${source}: expected true or false, got "${value}"`);
  }
}

function parseNumber(value: string, source: string, integer: boolean): number {
  const n = Number(value);
  const valid = integer ? Number.isInteger(n) && n >= 0 : Number.isFinite(n) && n > 0;
  if (value.trim() === "" || !valid) {
    throw new ConfigError(
      `${source}: expected a ${integer ? "whole number" : "positive number"}, got "${value}"`
    );
  }
  return n;
}

function envName(key: string): string {
  return ENV_PREFIX + key.toUpperCase().replace(/-/g, "_");
}

/**
 * Resolve settings from flags, then `GRAPHQL2JSON_*` variables, then the
 * YAML config file, then defaults.
 */
export function loadConfig(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  options: LoadConfigOptions = {}
): CliConfig {
  const args = parseArgs(argv);

  const explicitConfig = args.values.config;
  let configFile: string | undefined;
  if (explicitConfig) {
    configFile = resolve(explicitConfig);
    if (!existsSync(configFile)) {
      throw new ConfigError(`config file not found: ${configFile}`);
    }
  } else {
    const fallback = join(options.homeDir ?? homedir(), CONFIG_FILE_NAME);
    if (existsSync(fallback)) configFile = fallback;
  }
  const file: FileConfig = configFile ? parseConfigFile(configFile) : {};

  /** Flag, then env var, as raw text with the source named for errors. */
  const lookup = (key: string): { value: string; source: string } | undefined => {
    const flag = args.values[key];
    if (flag !== undefined) return { value: flag, source: `--${key}` };
    const name = envName(key);
    const fromEnv = env[name];
    if (fromEnv !== undefined && fromEnv !== "") return { value: fromEnv, source: name };
    return undefined;
  };

  const text = (key: "input" | "output" | "endpoint" | "log"): string | undefined =>
    lookup(key)?.value ?? file[key];

  const bool = (key: "ignore-internals" | "nullable-array-items", fallback: boolean): boolean => {
    const raw = lookup(key);
    if (raw) return parseBoolean(raw.value, raw.source);
    return file[key] ?? fallback;
  };

  const num = (key: "timeout" | "retries", fallback: number, integer: boolean): number => {
    const raw = lookup(key);
    if (raw) return parseNumber(raw.value, raw.source, integer);
    return file[key] ?? fallback;
  };

  const idRaw = lookup("id-type");
  let idTypeMapping = file["id-type"] ?? DEFAULT_OPTIONS.idTypeMapping;
  if (idRaw) {
    if (!isIdTypeMapping(idRaw.value)) {
      throw new ConfigError(`invalid id-type mapping: ${idRaw.value}`);
    }
    idTypeMapping = idRaw.value;
  }

  const endpoint = text("endpoint");
  const logPath = text("log");
  const headerEntries = args.lists.header ?? file.headers ?? [];

  return {
    help: args.values.help !== undefined && parseBoolean(args.values.help, "--help"),
    input: text("input"),
    output: text("output"),
    endpoint: endpoint ? interpolateEnv(endpoint, env) : undefined,
    headers: parseHeaders(headerEntries, env),
    timeoutMs: num("timeout", DEFAULT_TIMEOUT_SECONDS, false) * 1000,
    retries: num("retries", DEFAULT_RETRIES, true),
    logPath: logPath ? resolve(logPath) : undefined,
    configFile,
    options: {
      ignoreInternals: bool("ignore-internals", DEFAULT_OPTIONS.ignoreInternals),
      nullableArrayItems: bool("nullable-array-items", DEFAULT_OPTIONS.nullableArrayItems),
      idTypeMapping,
    },
  };
}
