import { MagicPasswordManager, type MagicPasswordManagerOptions } from "./api/MagicPasswordManager";

export type { AddEntryInput, MagicPasswordManagerOptions } from "./api/MagicPasswordManager";
export { MagicPasswordManager } from "./api/MagicPasswordManager";
export { listDatabases } from "./catalog/DatabaseCatalog";
export { DatabaseCodec, withDatabase } from "./codec/DatabaseCodec";
export { CellCipher } from "./crypto/CellCipher";
export { LogRing, formatLogEntry } from "./diagnostics/LogRing";
export type { LogEntry, LogLevel, Logger } from "./diagnostics/LogRing";
export { characterCounts, cryptoRandom, generatePassword } from "./generator/PasswordGenerator";
export type { CharacterCounts, RandomSource } from "./generator/PasswordGenerator";
export { addEntry, createEmptyDatabase, nextIndex, removeEntry, toRows } from "./store/EntryStore";
export { MPM_CONSTANTS } from "./constants";
export * from "./errors";
export type { Database, EntryRow, KdfParams, NewEntry, OpenDatabase } from "./types";

/**
 * Creates a `MagicPasswordManager` bound to a directory of `.mpmdb` files.
 *
 * @example
 * ```typescript
 * import magicPasswordManager from "magic-password-manager";
 *
 * const mpm = magicPasswordManager({ directory: "/home/me/vaults" });
 *
 * async function main() {
 *   await mpm.createDatabase("personal", "correct horse battery staple");
 *   await mpm.addEntry("personal", "correct horse battery staple", {
 *     title: "Mail",
 *     username: "me@example.com",
 *     passwordLength: 16
 *   });
 *   const db = await mpm.openDatabase("personal", "correct horse battery staple");
 *   console.log(db.entries[0].password);
 * }
 *
 * main();
 * ```
 */
export default function magicPasswordManager(opts?: MagicPasswordManagerOptions): MagicPasswordManager {
  return new MagicPasswordManager(opts);
}
