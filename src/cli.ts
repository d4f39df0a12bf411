import type { CliConfig } from "./config.js";
import { USAGE } from "./config.js";
import { fetchIntrospection } from "./api-client.js";
import { convert } from "./converter.js";
import { InputError, formatError } from "./errors.js";
import { readInputFile, readStdin, writeSchema } from "./io.js";
import type { InputStream, OutputStream } from "./io.js";
import type { IntrospectionQuery } from "./types.js";

export interface CliIo {
  stdin: InputStream;
  stdout: OutputStream;
  /** Status messages; stdout carries only the schema. */
  log: (message: string) => void;
}

export const NO_INPUT_MESSAGE =
  "no input provided: use --endpoint, --input, or pipe data to stdin";

async function loadIntrospection(
  config: CliConfig,
  io: CliIo
): Promise<IntrospectionQuery> {
  if (config.endpoint) {
    io.log(`Fetching schema from endpoint: ${config.endpoint}`);
    return fetchIntrospection({
      endpoint: config.endpoint,
      headers: config.headers,
      timeoutMs: config.timeoutMs,
      retries: config.retries,
      logPath: config.logPath,
      onRetry: (retry, delayMs, error) => {
        io.log(
          `Retrying introspection request (${retry}/${config.retries}) in ${Math.round(delayMs)}ms: ${formatError(error)}`
        );
      },
    });
  }

  if (config.input) {
    return readInputFile(config.input);
  }

  const piped = await readStdin(io.stdin);
  if (!piped) {
    throw new InputError(NO_INPUT_MESSAGE);
  }
  return piped;
}

export async function run(config: CliConfig, io: CliIo): Promise<void> {
  if (config.help) {
    io.stdout.write(USAGE + "\n");
    return;
  }

  if (config.configFile) {
    io.log(`Using config file: ${config.configFile}`);
  }

  const introspection = await loadIntrospection(config, io);
  const schema = convert(introspection, config.options);
  await writeSchema(schema, config.output, io.stdout);

  if (config.output) {
    io.log(`Wrote JSON Schema to ${config.output}`);
  }
}
