/**
 * Read-only commands: get, paths, find, keys, flatten
 */

import type { Command } from "commander";
import { openDocument, type GlobalOptions } from "../lib/document.js";
import { printFlattened, printPaths, printValue } from "../lib/output.js";
import { CliError } from "../lib/errors.js";
import { withTiming } from "../lib/telemetry.js";

/**
 * Register the read-only commands on the program
 */
export function registerReadCommands(program: Command): void {
  program
    .command("get <file> <path>")
    .description("Print the value at a path as JSON")
    .action(async (file: string, path: string) => {
      await withTiming("cli.get", async () => {
        const opts = program.opts<GlobalOptions>();
        const doc = await openDocument(file, opts);

        const value = doc.get(path);
        if (value === undefined) {
          throw new CliError(`Path not found: ${path}`, { exitCode: 2 });
        }

        printValue(value, opts);
      });
    });

  program
    .command("paths <file>")
    .description("List leaf paths, one per line")
    .option("--prefix <path>", "Only list paths under this prefix")
    .action(async (file: string, options: { prefix?: string }) => {
      await withTiming("cli.paths", async () => {
        const doc = await openDocument(file, program.opts<GlobalOptions>());
        printPaths(doc.listPaths(options.prefix ?? ""));
      });
    });

  program
    .command("find <file> <pattern>")
    .description("List leaf paths matching a glob (* one segment, ** any number)")
    .action(async (file: string, pattern: string) => {
      await withTiming("cli.find", async () => {
        const doc = await openDocument(file, program.opts<GlobalOptions>());
        printPaths(doc.findPaths(pattern));
      });
    });

  program
    .command("keys <file> <name>")
    .description("List leaf paths whose last segment is <name>")
    .action(async (file: string, name: string) => {
      await withTiming("cli.keys", async () => {
        const doc = await openDocument(file, program.opts<GlobalOptions>());
        printPaths(doc.findAllKeys(name));
      });
    });

  program
    .command("flatten <file>")
    .description("Print every leaf as a path → value JSON object")
    .option("--separator <sep>", "Segment separator in printed paths", ".")
    .action(async (file: string, options: { separator: string }) => {
      await withTiming("cli.flatten", async () => {
        const opts = program.opts<GlobalOptions>();
        const doc = await openDocument(file, opts);
        printFlattened(doc.flatten(options.separator), opts);
      });
    });
}
