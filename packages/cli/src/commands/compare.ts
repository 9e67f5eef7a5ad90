/**
 * Commands over several documents: diff, merge
 */

import type { Command } from "commander";
import {
  openDirectory,
  openDocument,
  saveDocument,
  type GlobalOptions,
  type WriteOptions,
} from "../lib/document.js";
import { printStatus, printValue } from "../lib/output.js";
import { CliError } from "../lib/errors.js";
import { withTiming } from "../lib/telemetry.js";
import { addWriteOptions } from "./write.js";

/**
 * Register diff and merge on the program
 */
export function registerCompareCommands(program: Command): void {
  program
    .command("diff <a> <b>")
    .description("Print leaves added, removed and changed from <a> to <b>")
    .option("--exit-code", "Exit with 1 when the documents differ")
    .action(async (a: string, b: string, options: { exitCode?: boolean }) => {
      await withTiming("cli.diff", async () => {
        const opts = program.opts<GlobalOptions>();
        const [left, right] = await Promise.all([openDocument(a, opts), openDocument(b, opts)]);

        const result = left.diff(right);
        printValue(result, opts);

        const differs = [result.added, result.removed, result.changed].some(
          (part) => Object.keys(part).length > 0
        );
        if (options.exitCode && differs) {
          throw new CliError("Documents differ", { exitCode: 1 });
        }
      });
    });

  addWriteOptions(
    program
      .command("merge <dir>")
      .description("Deep-merge the JSON files of a directory in name order")
      .option("--pattern <glob>", "File name pattern (default *.json)")
      .option("--out <file>", "Save the merged document instead of printing it")
  ).action(
    async (dir: string, options: WriteOptions & { pattern?: string; out?: string }) => {
      await withTiming("cli.merge", async () => {
        const opts = program.opts<GlobalOptions>();
        const doc = await openDirectory(dir, opts, options.pattern);

        if (options.out === undefined) {
          printValue(doc.toCopy(), opts);
          return;
        }

        await saveDocument(doc, options.out, options);
        printStatus(`Merged ${dir} into ${options.out}`, opts);
      });
    }
  );
}
