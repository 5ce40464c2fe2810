import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { MPM_CONSTANTS } from "../constants";
import { NotFoundError, PersistenceError } from "../errors";
import { errnoCode } from "../storage/FileStorage";

/**
 * Lists the database names in `directory`: regular files ending in
 * `extension`, extension stripped, sorted by code unit.
 *
 * @throws {NotFoundError} If the directory does not exist.
 */
export async function listDatabases(
  directory: string,
  extension: string = MPM_CONSTANTS.FILE_EXTENSION
): Promise<string[]> {
  let dirents: Dirent[];
  try {
    dirents = await readdir(directory, { withFileTypes: true });
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new NotFoundError(`Directory not found: "${directory}"`);
    }
    throw new PersistenceError(
      `Failed to list "${directory}": ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return dirents
    .filter((d) => d.isFile() && d.name.endsWith(extension) && d.name.length > extension.length)
    .map((d) => d.name.slice(0, -extension.length))
    .sort();
}
