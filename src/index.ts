#!/usr/bin/env node

import { loadConfig } from "./config.js";
import { run } from "./cli.js";
import { formatError } from "./errors.js";

try {
  const config = loadConfig(process.argv.slice(2), process.env);
  await run(config, {
    stdin: process.stdin,
    stdout: process.stdout,
    log: (message) => console.error(message),
  });
} catch (error) {
  console.error(formatError(error));
  process.exitCode = 1;
}
