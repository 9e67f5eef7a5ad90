/**
 * Commands that change a file: set, delete, clean
 */

import type { Command } from "commander";
import {
  openDocument,
  saveDocument,
  type GlobalOptions,
  type WriteOptions,
} from "../lib/document.js";
import { parseIndent } from "../lib/arg.js";
import { readValueArgument } from "../lib/input.js";
import { printStatus, printValue } from "../lib/output.js";
import { CliError } from "../lib/errors.js";
import { withTiming } from "../lib/telemetry.js";

/**
 * Add the output formatting options shared by writing commands
 */
export function addWriteOptions(command: Command): Command {
  return command
    .option("--indent <n>", "Spaces per indent level (default 2)", (val) =>
      parseIndent(val, "--indent")
    )
    .option("--compact", "Write compact JSON")
    .option("--sort-keys", "Write map keys in alphabetical order");
}

/**
 * Register the writing commands on the program
 */
export function registerWriteCommands(program: Command): void {
  addWriteOptions(
    program
      .command("set <file> <path> [value]")
      .description("Set the value at a path (JSON, or a plain string) and save the file")
  ).action(async (file: string, path: string, value: string | undefined, options: WriteOptions) => {
    await withTiming("cli.set", async () => {
      const opts = program.opts<GlobalOptions>();
      const doc = await openDocument(file, opts);

      doc.set(path, await readValueArgument(value, { maxBytes: opts.maxSize }));
      await saveDocument(doc, file, options);

      printStatus(`Set ${path} in ${file}`, opts);
    });
  });

  addWriteOptions(
    program.command("delete <file> <path>").description("Remove the value at a path and save the file")
  ).action(async (file: string, path: string, options: WriteOptions) => {
    await withTiming("cli.delete", async () => {
      const opts = program.opts<GlobalOptions>();
      const doc = await openDocument(file, opts);

      if (!doc.delete(path)) {
        throw new CliError(`Path not found: ${path}`, { exitCode: 2 });
      }
      await saveDocument(doc, file, options);

      printStatus(`Deleted ${path} from ${file}`, opts);
    });
  });

  addWriteOptions(
    program
      .command("clean <file>")
      .description("Remove null values and empty containers (both unless one is chosen)")
      .option("--nulls", "Remove null values")
      .option("--empty", "Remove empty maps and lists")
  ).action(
    async (file: string, options: WriteOptions & { nulls?: boolean; empty?: boolean }) => {
      await withTiming("cli.clean", async () => {
        const opts = program.opts<GlobalOptions>();
        const doc = await openDocument(file, opts);
        const both = !options.nulls && !options.empty;

        const removed: Record<string, number> = {};
        if (both || options.nulls) {
          removed.nulls = doc.removeNulls();
        }
        if (both || options.empty) {
          removed.empty = doc.removeEmpty();
        }

        if (Object.values(removed).some((count) => count > 0)) {
          await saveDocument(doc, file, options);
        }

        printValue(removed, opts);
      });
    }
  );
}
