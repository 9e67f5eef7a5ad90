/**
 * Query command over a list inside a document
 */

import type { Command } from "commander";
import { fieldOf, valuesEqual, type DocumentValue } from "@docpath/sdk";
import { openDocument, type GlobalOptions } from "../lib/document.js";
import { collectWhere, parseNonNegativeInt } from "../lib/arg.js";
import { groupsToJson, printValue } from "../lib/output.js";
import { CliError } from "../lib/errors.js";
import { withTiming } from "../lib/telemetry.js";

type QueryOptions = {
  where: Array<[string, DocumentValue]>;
  sort?: string | true;
  reverse?: boolean;
  offset?: number;
  limit?: number;
  pluck?: string;
  groupBy?: string;
  count?: boolean;
  first?: boolean;
};

/**
 * Register the query command on the program
 */
export function registerQueryCommand(program: Command): void {
  program
    .command("query <file> <path>")
    .description("Filter, sort and page the list at <path>")
    .option(
      "--where <field=json>",
      "Keep elements whose top-level field equals the value (repeatable)",
      collectWhere,
      []
    )
    .option("--sort [field]", "Sort by a top-level field, or by the elements themselves")
    .option("--reverse", "Sort in descending order")
    .option("--offset <n>", "Skip N results", (val) => parseNonNegativeInt(val, "--offset"))
    .option("--limit <n>", "Maximum results", (val) => parseNonNegativeInt(val, "--limit"))
    .option("--pluck <field>", "Print one field of each result")
    .option("--group-by <field>", "Print results bucketed by a field")
    .option("--count", "Print the number of matching elements")
    .option("--first", "Print the first result only")
    .action(async (file: string, path: string, options: QueryOptions) => {
      await withTiming("cli.query", async () => {
        const modes = [
          options.count,
          options.first,
          options.pluck !== undefined,
          options.groupBy !== undefined,
        ].filter(Boolean);
        if (modes.length > 1) {
          throw new CliError("Choose only one of --count, --first, --pluck and --group-by");
        }

        const opts = program.opts<GlobalOptions>();
        const doc = await openDocument(file, opts);
        const pipeline = doc.query(path);

        for (const [field, expected] of options.where) {
          pipeline.where((item) => {
            const actual = fieldOf(item, field);
            return actual !== undefined && valuesEqual(actual, expected);
          });
        }
        if (options.sort !== undefined) {
          pipeline.sort(options.sort === true ? undefined : options.sort, Boolean(options.reverse));
        }
        if (options.offset !== undefined) {
          pipeline.offset(options.offset);
        }
        if (options.limit !== undefined) {
          pipeline.limit(options.limit);
        }

        let output: unknown;
        if (options.count) {
          output = pipeline.count();
        } else if (options.first) {
          output = pipeline.first() ?? null;
        } else if (options.pluck !== undefined) {
          output = pipeline.pluck(options.pluck);
        } else if (options.groupBy !== undefined) {
          output = groupsToJson(pipeline.groupBy(options.groupBy));
        } else {
          output = pipeline.execute();
        }

        printValue(output, opts);
      });
    });
}
