/**
 * Value arguments for writing commands
 */

import { resolveLoadOptions, type DocumentValue } from "@docpath/sdk";
import { parseValue } from "./arg.js";
import { CliError } from "./errors.js";

export interface ValueInputOptions {
  /** Largest value accepted on stdin; defaults to the document size ceiling */
  maxBytes?: number;
  stdin?: NodeJS.ReadableStream;
}

/**
 * Read a stream to the end, failing as soon as it passes maxBytes
 */
export async function readLimited(stream: NodeJS.ReadableStream, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of stream) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    size += buffer.length;
    if (size > maxBytes) {
      throw new CliError(`Value on stdin is larger than ${maxBytes} bytes`);
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Resolve the value of `set`: the argument when given, otherwise piped stdin
 *
 * Either way the text is parsed as JSON, falling back to a plain string.
 */
export async function readValueArgument(
  value: string | undefined,
  options: ValueInputOptions = {}
): Promise<DocumentValue> {
  if (value !== undefined) {
    return parseValue(value);
  }

  const stdin = options.stdin ?? process.stdin;
  if ("isTTY" in stdin && stdin.isTTY === true) {
    throw new CliError("No value provided. Pass <value> or pipe it to stdin");
  }

  const maxBytes = options.maxBytes ?? resolveLoadOptions().maxSize;
  const text = (await readLimited(stdin, maxBytes)).trim();
  if (!text) {
    throw new CliError("stdin is empty");
  }
  return parseValue(text);
}
