import { randomBytes } from "node:crypto";
import { open, readFile, rename, rm, stat, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { AlreadyExistsError, NotFoundError, PersistenceError } from "../errors";
import { LogRing, type Logger } from "../diagnostics/LogRing";

const FILE_MODE = 0o600;

export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Whole-file access to database files. Reads are plain, writes go to a
 * sibling temp file that is fsynced and renamed over the target, so an
 * interrupted save leaves the previous file intact.
 */
export class FileStorage {
  constructor(private readonly logger: Logger = new LogRing()) {}

  async exists(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isFile();
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return false;
      throw new PersistenceError(`Failed to stat "${path}": ${describe(err)}`);
    }
  }

  async read(path: string): Promise<string> {
    try {
      return await readFile(path, { encoding: "utf8" });
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOENT" || code === "EISDIR") throw new NotFoundError();
      if (code === "EACCES") throw new PersistenceError(`Permission denied reading "${path}"`);
      throw new PersistenceError(`Failed to read "${path}": ${describe(err)}`);
    }
  }

  /** Creates `path`, failing if anything already exists there. */
  async createExclusive(path: string, content: string): Promise<void> {
    try {
      await writeFile(path, content, { encoding: "utf8", flag: "wx", mode: FILE_MODE });
    } catch (err) {
      if (errnoCode(err) === "EEXIST") throw new AlreadyExistsError();
      throw new PersistenceError(`Failed to create "${path}": ${describe(err)}`);
    }
  }

  /** Replaces the contents of `path` atomically: temp file, fsync, rename. */
  async write(path: string, content: string): Promise<void> {
    const tmpPath = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString("hex")}.tmp`);

    try {
      const handle = await open(tmpPath, "wx", FILE_MODE);
      try {
        await handle.writeFile(content, { encoding: "utf8" });
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, path);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.warn("Failed to remove temp file", { tmpPath, error: describe(cleanupErr) });
      });
      throw new PersistenceError(`Atomic write to "${path}" failed: ${describe(err)}`);
    }
  }

  async remove(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOENT") throw new NotFoundError();
      throw new PersistenceError(`Failed to delete "${path}": ${describe(err)}`);
    }
  }
}
