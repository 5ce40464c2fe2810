import { MPM_CONSTANTS } from "../constants";
import { CellCipher } from "../crypto/CellCipher";
import { LogRing, type Logger } from "../diagnostics/LogRing";
import {
  AlreadyExistsError,
  CorruptFileError,
  CryptoError,
  InvalidPassphraseError
} from "../errors";
import { FileStorage } from "../storage/FileStorage";
import { createEmptyDatabase, toRows } from "../store/EntryStore";
import type { CellKeys, Database, EntryRow, OpenDatabase } from "../types";
import { formatCsv, parseCsv } from "./csv";

const COLUMN_COUNT = MPM_CONSTANTS.HEADER.length;
const INDEX_RE = /^(0|[1-9][0-9]*)$/;

export interface DatabaseCodecOptions {
  cipher?: CellCipher;
  storage?: FileStorage;
  logger?: Logger;
}

/** Pairs an already opened database handle with new contents. */
export function withDatabase(open: OpenDatabase, database: Database): OpenDatabase {
  return { path: open.path, keys: open.keys, database };
}

function parseIndex(text: string, rowNumber: number): number {
  const value = INDEX_RE.test(text) ? Number(text) : NaN;
  if (!Number.isSafeInteger(value)) {
    throw new CorruptFileError(`Row ${rowNumber} has an invalid index`);
  }
  return value;
}

/**
 * Reads and writes database files: a CSV table whose every cell is
 * encoded by {@link CellCipher}.
 *
 * Passphrase check: the header must authenticate and its first cell must read
 * `index`. The second test is a known-plaintext probe and only probabilistic
 * on its own; with the authenticated cipher the first test decides in practice.
 */
export class DatabaseCodec {
  private readonly cipher: CellCipher;
  private readonly storage: FileStorage;
  private readonly logger: Logger;

  constructor(opts?: DatabaseCodecOptions) {
    this.logger = opts?.logger ?? new LogRing();
    this.cipher = opts?.cipher ?? new CellCipher();
    this.storage = opts?.storage ?? new FileStorage(this.logger);
  }

  /**
   * @throws {NotFoundError} If `path` does not exist.
   * @throws {CorruptFileError} If the table is malformed or an entry fails to authenticate.
   * @throws {InvalidPassphraseError} If the header does not decode to the expected schema under `passphrase`.
   */
  async load(path: string, passphrase: string): Promise<OpenDatabase> {
    const text = await this.storage.read(path);
    const rows = parseCsv(text);

    if (rows.length === 0) {
      throw new CorruptFileError("Database file has no header row");
    }
    rows.forEach((row, i) => {
      if (row.length !== COLUMN_COUNT) {
        throw new CorruptFileError(`Row ${i + 1} has ${row.length} cells; expected ${COLUMN_COUNT}`);
      }
    });

    const keys = await this.cipher.keysFor(passphrase);
    await this.checkHeader(path, rows[0], keys);

    const entries: EntryRow[] = [];
    const seen = new Set<number>();
    for (let i = 1; i < rows.length; i++) {
      const [index, title, username, password] = await this.decodeEntryCells(rows[i], keys, i + 1);
      const value = parseIndex(index, i + 1);
      if (seen.has(value)) {
        throw new CorruptFileError(`Row ${i + 1} repeats index ${value}`);
      }
      seen.add(value);
      entries.push({ index: value, title, username, password });
    }

    this.logger.debug("Database loaded", { path, entries: entries.length });
    return { path, keys, database: { header: MPM_CONSTANTS.HEADER, entries } };
  }

  /**
   * Writes a header-only database.
   *
   * @throws {AlreadyExistsError} If a file already exists at `path`.
   */
  async create(path: string, passphrase: string): Promise<void> {
    if (await this.storage.exists(path)) {
      throw new AlreadyExistsError();
    }
    const keys = await this.cipher.keysFor(passphrase);
    const content = await this.encodeTable(createEmptyDatabase(), keys);
    await this.storage.createExclusive(path, content);
    this.logger.info("Database created", { path });
  }

  /** Re-encodes every cell with the keys `open` was loaded under and replaces the file. */
  async save(open: OpenDatabase): Promise<void> {
    const content = await this.encodeTable(open.database, open.keys);
    await this.storage.write(open.path, content);
    this.logger.debug("Database saved", { path: open.path, entries: open.database.entries.length });
  }

  /**
   * @throws {NotFoundError} If `path` does not exist.
   */
  async delete(path: string): Promise<void> {
    await this.storage.remove(path);
    this.logger.info("Database deleted", { path });
  }

  private async checkHeader(path: string, cells: string[], keys: CellKeys): Promise<void> {
    const header: string[] = [];
    for (const cell of cells) {
      try {
        header.push(await this.cipher.decodeWithKeys(cell, keys));
      } catch (e) {
        if (e instanceof CryptoError) {
          this.logger.info("Passphrase rejected", { path });
          throw new InvalidPassphraseError();
        }
        throw e;
      }
    }

    if (header[0] !== MPM_CONSTANTS.HEADER[0]) {
      this.logger.info("Passphrase rejected", { path });
      throw new InvalidPassphraseError();
    }
    if (!MPM_CONSTANTS.HEADER.every((name, i) => header[i] === name)) {
      throw new CorruptFileError("Database header does not match the expected columns");
    }
  }

  private async decodeEntryCells(cells: string[], keys: CellKeys, rowNumber: number): Promise<string[]> {
    const out: string[] = [];
    for (const cell of cells) {
      try {
        out.push(await this.cipher.decodeWithKeys(cell, keys));
      } catch (e) {
        if (e instanceof CryptoError) {
          throw new CorruptFileError(`Row ${rowNumber} failed authentication`);
        }
        throw e;
      }
    }
    return out;
  }

  private async encodeTable(database: Database, keys: CellKeys): Promise<string> {
    const encoded: string[][] = [];
    for (const row of toRows(database)) {
      const cells: string[] = [];
      for (const cell of row) {
        cells.push(await this.cipher.encodeWithKeys(cell, keys));
      }
      encoded.push(cells);
    }
    return formatCsv(encoded);
  }
}
