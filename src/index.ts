import { Command, InvalidArgumentError } from "commander";

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiStyle,
  type ErrorFormatLineKind,
} from "./core/error-format.js";

import { exportCommand } from "./cli/export.js";
import { inspectCommand } from "./cli/inspect.js";
import { serveCommand } from "./cli/serve.js";

// =============================================================================
// PROGRAM
// =============================================================================

export function buildCli(): Command {
  const program = new Command();

  program
    .name("wirebridge")
    .description("Connection editor and exporter for Proteus project files")
    .version("0.1.0")
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("serve")
    .description("Start the connection editor on localhost")
    .option("--config <path>", "Path to a wirebridge.yaml config file")
    .option("--host <host>", "Interface to bind")
    .option("--port <port>", "Port to listen on (0 picks a free port)", parsePort)
    .option("--storage-dir <dir>", "Directory for uploads and generated files")
    .option("--open", "Open the editor in a browser once it is running")
    .action(async (opts) => {
      await serveCommand(opts);
    });

  program
    .command("inspect")
    .description("Classify a project file and list the components recovered from it")
    .argument("<file>", "Project file to inspect")
    .option("--json", "Print the result as JSON", false)
    .action(async (file: string, opts) => {
      await inspectCommand(file, opts);
    });

  program
    .command("export")
    .description("Write the netlist, script, guide and project copy for a connection list")
    .argument("<file>", "Project file the connections belong to")
    .requiredOption("--connections <path>", "JSON file with the connection list")
    .option("--out <dir>", "Output directory (defaults to the working directory)")
    .option("--config <path>", "Path to a wirebridge.yaml config file")
    .action(async (file: string, opts) => {
      await exportCommand(file, opts);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildCli();
  try {
    await program.parseAsync(argv);
  } catch (err) {
    const debug = program.opts<{ debug?: boolean }>().debug === true;
    printError(err, debug);
    process.exitCode = 1;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

const LINE_STYLES: Record<ErrorFormatLineKind, AnsiStyle[]> = {
  title: ["bold", "red"],
  message: [],
  hint: ["yellow"],
  code: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};

const LINE_PREFIXES: Partial<Record<ErrorFormatLineKind, string>> = {
  hint: "Hint: ",
  code: "Code: ",
  cause: "Cause: ",
};

function printError(err: unknown, debug: boolean): void {
  const format = createAnsiFormatter(resolveColorEnabled({ stream: process.stderr }));
  for (const line of formatErrorLines(err, { mode: debug ? "debug" : "short" })) {
    const prefix = LINE_PREFIXES[line.kind] ?? "";
    console.error(format(`${prefix}${line.text}`, LINE_STYLES[line.kind]));
  }
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError("Port must be an integer between 0 and 65535.");
  }
  return port;
}
