import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Readable } from "node:stream";
import { run, NO_INPUT_MESSAGE, type CliIo } from "../src/cli.js";
import { USAGE, type CliConfig } from "../src/config.js";
import { DEFAULT_OPTIONS } from "../src/options.js";
import type { SchemaDocument } from "../src/types.js";

const introspection = {
  __schema: {
    queryType: { name: "Query" },
    mutationType: null,
    types: [
      {
        kind: "OBJECT",
        name: "Query",
        fields: [{ name: "node", args: [], type: { kind: "SCALAR", name: "ID", ofType: null } }],
      },
      { kind: "SCALAR", name: "ID" },
    ],
  },
};

let dir: string;
let stdout: string[];
let messages: string[];

function makeConfig(overrides: Partial<CliConfig> = {}): CliConfig {
  return {
    help: false,
    headers: {},
    timeoutMs: 30_000,
    retries: 0,
    options: { ...DEFAULT_OPTIONS },
    ...overrides,
  };
}

function makeIo(stdin: CliIo["stdin"] = Object.assign(Readable.from([]), { isTTY: true })): CliIo {
  return {
    stdin,
    stdout: { write: (chunk) => stdout.push(chunk) },
    log: (message) => messages.push(message),
  };
}

function printedSchema(): SchemaDocument {
  return JSON.parse(stdout.join(""));
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "gql2jsonschema-cli-test-"));
  stdout = [];
  messages = [];
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("run", () => {
  it("prints usage for --help without reading input", async () => {
    await run(makeConfig({ help: true }), makeIo());
    expect(stdout).toEqual([USAGE + "\n"]);
  });

  it("converts an input file to stdout", async () => {
    const input = join(dir, "introspection.json");
    writeFileSync(input, JSON.stringify(introspection), "utf-8");

    await run(makeConfig({ input, options: { ...DEFAULT_OPTIONS, idTypeMapping: "number" } }), makeIo());

    const schema = printedSchema();
    expect(schema.properties.Query?.properties?.node?.properties?.return?.type).toBe("number");
    expect(Object.keys(schema.definitions)).toEqual(["ID"]);
    expect(messages).toEqual([]);
  });

  it("writes to the output file and reports it", async () => {
    const input = join(dir, "introspection.json");
    const output = join(dir, "out", "schema.json");
    writeFileSync(input, JSON.stringify(introspection), "utf-8");

    await run(makeConfig({ input, output }), makeIo());

    expect(stdout).toEqual([]);
    expect(JSON.parse(readFileSync(output, "utf-8")).$schema).toBe(
      "http://json-schema.org/draft-06/schema#"
    );
    expect(messages).toEqual([`Wrote JSON Schema to ${output}`]);
  });

  it("reads piped stdin when no endpoint or input is given", async () => {
    await run(makeConfig(), makeIo(Readable.from([JSON.stringify({ data: introspection })])));
    expect(printedSchema().properties.Query?.type).toBe("object");
  });

  it("fails when there is no input at all", async () => {
    await expect(run(makeConfig(), makeIo())).rejects.toThrow(NO_INPUT_MESSAGE);
    expect(NO_INPUT_MESSAGE).toBe("no input provided: use --endpoint, --input, or pipe data to stdin");
  });

  it("fetches from the endpoint before looking at the input file", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response(JSON.stringify({ data: introspection }), { status: 200 }));

    await run(
      makeConfig({
        endpoint: "https://api.test/graphql",
        headers: { Authorization: "Bearer test-token" },
        input: join(dir, "ignored.json"),
      }),
      makeIo()
    );

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(messages).toEqual(["Fetching schema from endpoint: https://api.test/graphql"]);
    expect(printedSchema().properties.Query?.properties).toHaveProperty("node");
  });

  it("logs the endpoint exchange to the --log file", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response(JSON.stringify({ data: introspection }), { status: 200 })
    );
    const logPath = join(dir, "requests.log");

    await run(makeConfig({ endpoint: "https://api.test/graphql", logPath }), makeIo());

    const record = JSON.parse(readFileSync(logPath, "utf-8").trim());
    expect(record.endpoint).toBe("https://api.test/graphql");
    expect(record.status).toBe(200);
    expect(record.attempt).toBe(1);
  });

  it("mentions the config file in use", async () => {
    const input = join(dir, "introspection.json");
    writeFileSync(input, JSON.stringify(introspection), "utf-8");

    await run(makeConfig({ input, configFile: "/home/test/.gql2jsonschema.yaml" }), makeIo());
    expect(messages[0]).toBe("Using config file: /home/test/.gql2jsonschema.yaml");
  });

  it("fails the conversion for an invalid id-type", async () => {
    const input = join(dir, "introspection.json");
    writeFileSync(input, JSON.stringify(introspection), "utf-8");
    const options = JSON.parse('{"ignoreInternals":true,"nullableArrayItems":false,"idTypeMapping":"hex"}');

    await expect(run(makeConfig({ input, options }), makeIo())).rejects.toThrow(
      "invalid id-type mapping: hex"
    );
    expect(stdout).toEqual([]);
  });
});
