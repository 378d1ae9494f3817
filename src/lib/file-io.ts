/**
 * File I/O utilities, kept free of pipeline concerns.
 */

import { type FileHandle, open } from "node:fs/promises";
import { extractErrorCode } from "../core/pipeline/errors.js";

export type FileReadResult =
  | {
      success: true;
      /** The content of the file as a string */
      content: string;
      /** The path the content was read from */
      source: string;
    }
  | {
      success: false;
      source: string;
      /** Node error code such as ENOENT or EISDIR */
      code: string;
      reason: string;
    };

/**
 * Read a UTF-8 text file.
 *
 * The file handle is closed before the promise settles, whichever way it settles.
 * Failures are returned, not thrown.
 *
 * @example
 * ```typescript
 * const result = await readTextFile("./words.txt");
 * if (result.success) console.log(result.content);
 * ```
 */
export async function readTextFile(path: string): Promise<FileReadResult> {
  let handle: FileHandle | undefined;

  try {
    handle = await open(path, "r");
    const content = await handle.readFile({ encoding: "utf8" });
    return { success: true, content, source: path };
  } catch (error) {
    return {
      success: false,
      source: path,
      code: extractErrorCode(error),
      reason: error instanceof Error ? error.message : String(error),
    };
  } finally {
    await handle?.close();
  }
}
