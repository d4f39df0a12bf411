import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { InputError } from "./errors.js";
import { parseIntrospectionResult } from "./introspection.js";
import type { IntrospectionQuery, SchemaDocument } from "./types.js";

/** The parts of `process.stdin` the reader needs. */
export interface InputStream extends AsyncIterable<string | Buffer> {
  isTTY?: boolean;
}

/** The parts of `process.stdout` the writer needs. */
export interface OutputStream {
  write(chunk: string): unknown;
}

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InputError(
      `error parsing ${source}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export async function readInputFile(path: string): Promise<IntrospectionQuery> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new InputError(
      `error reading input file: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseIntrospectionResult(parseJson(text, "input file"));
}

/**
 * Read an introspection result piped on stdin. Returns null when stdin is
 * an interactive terminal, i.e. nothing was piped.
 */
export async function readStdin(stream: InputStream): Promise<IntrospectionQuery | null> {
  if (stream.isTTY) return null;

  // Decode once: a multi-byte character may straddle two chunks
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  const text = Buffer.concat(chunks).toString("utf-8");
  if (!text.trim()) return null;

  return parseIntrospectionResult(parseJson(text, "stdin data"));
}

export function serializeSchema(schema: SchemaDocument): string {
  return JSON.stringify(schema, null, 2);
}

/**
 * Write the schema to `outputPath`, creating parent directories, or to
 * `stdout` when no path is given.
 */
export async function writeSchema(
  schema: SchemaDocument,
  outputPath: string | undefined,
  stdout: OutputStream
): Promise<void> {
  const text = serializeSchema(schema);
  if (!outputPath) {
    stdout.write(text + "\n");
    return;
  }
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, text, "utf-8");
}
