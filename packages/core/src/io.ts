/**
 * Streaming text input.
 *
 * Corpora can be far larger than a single JS string, so every reader goes
 * line by line through `node:readline` instead of `readFile`.
 */
import { open } from "node:fs/promises";
import * as readline from "node:readline";

/**
 * Yield the lines of a UTF-8 file without their terminators (`\n` or `\r\n`).
 * A final line without a newline is yielded; a trailing newline does not
 * produce an extra empty line. Rejects if the file cannot be opened.
 */
export async function* readLines(path: string): AsyncGenerator<string, void, undefined> {
  const handle = await open(path, "r");
  const input = handle.createReadStream({ encoding: "utf-8" });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
    input.destroy();
  }
}
