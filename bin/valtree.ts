#!/usr/bin/env npx tsx
// bin/valtree.ts
// Command-line entry point for valtree
//
// Run:  npx tsx bin/valtree.ts fmt --pretty data.json

import * as fs from "fs";
import { loadConfig, validateConfig } from "../src/core/config";
import { traceFromConfig } from "../src/adapters/logging";
import { parseCliArgs, runCommand } from "./valtree-cli-lib";

function main(): void {
  const config = loadConfig();
  const validation = validateConfig(config);
  for (const warning of validation.warnings) console.error(`warning: ${warning}`);
  if (!validation.valid) {
    for (const error of validation.errors) console.error(`error: ${error}`);
    process.exit(2);
  }

  const result = runCommand(parseCliArgs(process.argv.slice(2)), {
    readFile: file => fs.readFileSync(file, "utf8"),
    config,
    trace: traceFromConfig(config.trace),
  });

  process.stdout.write(result.stdout);
  process.stderr.write(result.stderr);
  process.exit(result.code);
}

main();
