/**
 * File path sources for the validate command
 */

import * as readline from "readline";
import { InputReadError } from "./errors.js";

export interface PathInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
}

/**
 * Yield each non-empty trimmed line of `input` as a path
 */
export async function* readPathLines(input: NodeJS.ReadableStream): AsyncGenerator<string> {
  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity,
  });

  try {
    for await (const line of rl) {
      const trimmed = line.trim();
      if (trimmed === "") continue;
      yield trimmed;
    }
  } catch (error) {
    throw new InputReadError("Failed to read file paths from standard input", undefined, {
      cause: error,
    });
  } finally {
    rl.close();
  }
}

/**
 * Paths given as arguments, or read from `stdin` when there are none
 *
 * An interactive terminal on stdin yields no paths.
 */
export function collectFilePaths(
  args: readonly string[],
  stdin: PathInput = process.stdin,
): Iterable<string> | AsyncIterable<string> {
  if (args.length > 0) {
    return args;
  }
  if (stdin.isTTY) {
    return [];
  }
  return readPathLines(stdin);
}
