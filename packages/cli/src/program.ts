/**
 * docpath command-line program
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { parseByteSize } from "./lib/arg.js";
import { isVerbose } from "./lib/env.js";
import { formatUsageError } from "./lib/output.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import type { GlobalOptions } from "./lib/document.js";
import { registerReadCommands } from "./commands/read.js";
import { registerWriteCommands } from "./commands/write.js";
import { registerQueryCommand } from "./commands/query.js";
import { registerCompareCommands } from "./commands/compare.js";
import { registerReportCommands } from "./commands/report.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Read the version from package.json (one level above src/ and dist/)
 */
function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (
    packageJson !== null &&
    typeof packageJson === "object" &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * Build a fresh program with every command registered
 */
export function createProgram(): Command {
  const program = new Command();

  // Commander reports its own usage errors, then throws instead of exiting
  program
    .configureOutput({
      writeErr: (str) => console.error(formatUsageError(str)),
    })
    .exitOverride();

  program
    .name("docpath")
    .description("Read, query and edit JSON documents by dot-separated paths")
    .version(readVersion())
    .option("--base-dir <dir>", "Refuse to load files outside this directory")
    .option("--max-size <bytes>", "Largest file to load, in bytes", (val) =>
      parseByteSize(val, "--max-size")
    )
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .option("--raw", "Print compact JSON");

  registerReadCommands(program);
  registerWriteCommands(program);
  registerQueryCommand(program);
  registerCompareCommands(program);
  registerReportCommands(program);

  return program;
}

/**
 * Run the program and map the outcome to an exit code
 * @param argv - Arguments; with from "node" the first two are the runtime and script
 */
export async function run(argv: readonly string[], from: "node" | "user" = "node"): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync(argv, { from });
    return 0;
  } catch (err) {
    if (!(err instanceof CommanderError)) {
      const opts = program.opts<GlobalOptions>();
      console.error(`Error: ${formatCliError(err, Boolean(opts.verbose) || isVerbose())}`);
    }
    return mapErrorToExitCode(err);
  }
}
