/**
 * Structure reports: stats, describe
 */

import type { Command } from "commander";
import { openDocument, type GlobalOptions } from "../lib/document.js";
import { printValue } from "../lib/output.js";
import { withTiming } from "../lib/telemetry.js";

/**
 * Register the report commands on the program
 */
export function registerReportCommands(program: Command): void {
  program
    .command("stats <file>")
    .description("Count maps, lists, keys and values")
    .action(async (file: string) => {
      await withTiming("cli.stats", async () => {
        const opts = program.opts<GlobalOptions>();
        const doc = await openDocument(file, opts);
        printValue(doc.stats(), opts);
      });
    });

  program
    .command("describe <file>")
    .description("Describe the type and shape of every top-level key")
    .action(async (file: string) => {
      await withTiming("cli.describe", async () => {
        const opts = program.opts<GlobalOptions>();
        const doc = await openDocument(file, opts);
        printValue(doc.describe(), opts);
      });
    });
}
