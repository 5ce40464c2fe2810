import { resolve, join } from "node:path";
import { listDatabases } from "../catalog/DatabaseCatalog";
import { DatabaseCodec, withDatabase } from "../codec/DatabaseCodec";
import { MPM_CONSTANTS } from "../constants";
import { CellCipher } from "../crypto/CellCipher";
import { LogRing, type Logger } from "../diagnostics/LogRing";
import { ValidationError } from "../errors";
import { generatePassword, type RandomSource } from "../generator/PasswordGenerator";
import { FileStorage } from "../storage/FileStorage";
import { addEntry, removeEntry } from "../store/EntryStore";
import type { Database, KdfParams } from "../types";

/**
 * Configuration options for initializing MagicPasswordManager.
 */
export interface MagicPasswordManagerOptions {
  /** Where database files live. Defaults to the current working directory. */
  directory?: string;
  /** Database file extension, leading dot included. Defaults to `.mpmdb`. */
  extension?: string;
  kdf?: Partial<KdfParams>;
  logger?: Logger;
  /** Randomness for generated passwords; cryptographic by default. */
  random?: RandomSource;
}

export interface AddEntryInput {
  title: string;
  username: string;
  passwordLength?: number;
}

/**
 * Manages a directory of encrypted password databases.
 *
 * Every operation is a whole-file load, change and store. The passphrase is
 * only held for the duration of the call that receives it: derived keys are
 * dropped when the call returns.
 */
export class MagicPasswordManager {
  public readonly directory: string;
  public readonly extension: string;
  private readonly logger: Logger;
  private readonly cipher: CellCipher;
  private readonly codec: DatabaseCodec;
  private readonly random?: RandomSource;

  constructor(opts?: MagicPasswordManagerOptions) {
    this.directory = resolve(opts?.directory ?? process.cwd());
    this.extension = opts?.extension ?? MPM_CONSTANTS.FILE_EXTENSION;
    if (!/^\.[^./\\]+$/.test(this.extension)) {
      throw new ValidationError(`Invalid database extension "${this.extension}"`);
    }
    this.logger = opts?.logger ?? new LogRing();
    this.cipher = new CellCipher(opts?.kdf);
    this.random = opts?.random;
    this.codec = new DatabaseCodec({
      cipher: this.cipher,
      storage: new FileStorage(this.logger),
      logger: this.logger
    });
  }

  /**
   * Resolves a database name to its file path.
   *
   * @throws {ValidationError} If the name is empty, `.`/`..`, or contains a path separator.
   */
  resolvePath(name: string): string {
    if (typeof name !== "string" || name.trim().length === 0 || name === "." || name === "..") {
      throw new ValidationError("Database name must be a non-empty string");
    }
    if (/[\\/]/.test(name)) {
      throw new ValidationError("Database name must not contain path separators");
    }
    return join(this.directory, name + this.extension);
  }

  /** Names of the databases in {@link directory}, sorted. */
  async listDatabases(): Promise<string[]> {
    return listDatabases(this.directory, this.extension);
  }

  /**
   * @throws {AlreadyExistsError} If a database with that name exists.
   */
  async createDatabase(name: string, passphrase: string): Promise<void> {
    const path = this.resolvePath(name);
    await this.session(() => this.codec.create(path, passphrase));
  }

  /**
   * @throws {NotFoundError} If no database has that name.
   * @throws {InvalidPassphraseError} If the passphrase does not open it.
   */
  async openDatabase(name: string, passphrase: string): Promise<Database> {
    const path = this.resolvePath(name);
    return this.session(async () => (await this.codec.load(path, passphrase)).database);
  }

  async deleteDatabase(name: string): Promise<void> {
    await this.codec.delete(this.resolvePath(name));
  }

  /**
   * Adds an entry with a freshly generated password and saves the database.
   *
   * @returns The database as saved.
   * @throws {InvalidLengthError} If `passwordLength` is below 4.
   * @throws {InvalidFieldError} If title or username is empty.
   */
  async addEntry(name: string, passphrase: string, input: AddEntryInput): Promise<Database> {
    const path = this.resolvePath(name);
    return this.session(async () => {
      const open = await this.codec.load(path, passphrase);
      const password = generatePassword(
        input.passwordLength ?? MPM_CONSTANTS.GENERATOR.DEFAULT_LENGTH,
        this.random
      );
      const database = addEntry(open.database, {
        title: input.title,
        username: input.username,
        password
      });
      await this.codec.save(withDatabase(open, database));
      return database;
    });
  }

  /**
   * Removes the entry with the given index and saves the database.
   *
   * @returns The database as saved.
   * @throws {IndexNotFoundError} If no entry has that index.
   */
  async removeEntry(name: string, passphrase: string, index: number): Promise<Database> {
    const path = this.resolvePath(name);
    return this.session(async () => {
      const open = await this.codec.load(path, passphrase);
      const database = removeEntry(open.database, index);
      await this.codec.save(withDatabase(open, database));
      return database;
    });
  }

  private async session<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } finally {
      this.cipher.clear();
    }
  }
}
