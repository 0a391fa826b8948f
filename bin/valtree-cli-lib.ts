// bin/valtree-cli-lib.ts
// Argument parsing and command execution for the valtree command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { Store } from "../src/core/tree/store";
import { isTreeError } from "../src/core/errors";
import { isFail } from "../src/outcome/outcome";
import type { PartialTreeConfig } from "../src/core/config";
import type { TraceSink } from "../src/ports/trace";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliCommand = "fmt" | "get";

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  pretty?: boolean;
  command?: CliCommand;
  path?: string;
  file?: string;
  errors: string[];
};

export type CliResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CliIO = {
  readFile: (file: string) => string;
  config?: PartialTreeConfig;
  trace?: TraceSink;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function isCommand(arg: string): arg is CliCommand {
  return arg === "fmt" || arg === "get";
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { errors: [] };
  const positional: string[] = [];

  for (const arg of args) {
    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--pretty" || arg === "-p") {
      result.pretty = true;
    } else if (arg.startsWith("-") && arg !== "-") {
      result.errors.push(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [command, ...rest] = positional;
  if (command === undefined) return result;
  if (!isCommand(command)) {
    result.errors.push(`Unknown command: ${command}`);
    return result;
  }
  result.command = command;

  if (command === "get") {
    result.path = rest[0];
    result.file = rest[1];
    if (result.path === undefined) result.errors.push("get: missing <path>");
    if (result.file === undefined) result.errors.push("get: missing <file>");
    if (rest.length > 2) result.errors.push("get: too many arguments");
  } else {
    result.file = rest[0];
    if (result.file === undefined) result.errors.push("fmt: missing <file>");
    if (rest.length > 1) result.errors.push("fmt: too many arguments");
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
valtree - JSON value trees from the command line

USAGE:
  valtree fmt [--pretty] <file>       Re-encode a JSON file (compact by default)
  valtree get <path> <file>           Print the value at a dotted path

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -p, --pretty                       Indented output for fmt

ENVIRONMENT:
  VALTREE_INDENT                     Spaces per level in pretty output
  VALTREE_MAX_DEPTH                  Nesting limit when decoding
  VALTREE_TRACE                      Log tree events to stderr

EXAMPLES:
  valtree fmt --pretty data.json
  valtree get users.0.name data.json
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `valtree v${pkg.version}`;
    }
    return "valtree v0.1.0";
  } catch {
    return "valtree v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

function ok(stdout: string): CliResult {
  return { code: 0, stdout, stderr: "" };
}

function failWith(code: number, stderr: string): CliResult {
  return { code, stdout: "", stderr };
}

/**
 * Run a parsed command. Tree errors become exit code 1 with the error message
 * on stderr; usage problems exit with 2.
 */
export function runCommand(args: CliArgs, io: CliIO): CliResult {
  if (args.help) return ok(`${getHelpText()}\n`);
  if (args.version) return ok(`${getVersion()}\n`);
  if (args.errors.length > 0) {
    return failWith(2, `${args.errors.join("\n")}\nRun 'valtree --help' for usage.\n`);
  }
  if (!args.command || args.file === undefined) {
    return failWith(2, `${getHelpText()}\n`);
  }

  let text: string;
  try {
    text = io.readFile(args.file);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return failWith(1, `Cannot read ${args.file}: ${message}\n`);
  }

  const store = new Store({ config: io.config, trace: io.trace });
  try {
    const loaded = store.tryFromJson(text);
    if (isFail(loaded)) return failWith(1, `${loaded.failure.message}\n`);
    if (args.command === "fmt") {
      return ok(args.pretty ? store.toPrettyJson() : `${store.toJson()}\n`);
    }
    return ok(`${store.getValueString(args.path ?? "")}\n`);
  } catch (e) {
    if (isTreeError(e)) return failWith(1, `${e.message}\n`);
    throw e;
  } finally {
    store.dispose();
  }
}
