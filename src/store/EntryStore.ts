import { MPM_CONSTANTS } from "../constants";
import { IndexNotFoundError, InvalidFieldError } from "../errors";
import type { Database, EntryRow, NewEntry } from "../types";

export function createEmptyDatabase(): Database {
  return { header: MPM_CONSTANTS.HEADER, entries: [] };
}

/** `0` for an empty database, otherwise one past the highest index in use. */
export function nextIndex(database: Database): number {
  let max = -1;
  for (const entry of database.entries) {
    if (entry.index > max) max = entry.index;
  }
  return max + 1;
}

function requireField(name: keyof NewEntry, value: unknown): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new InvalidFieldError(name);
  }
  return value;
}

/**
 * Appends an entry under the next free index. The input database is left untouched.
 *
 * @throws {InvalidFieldError} If title, username or password is empty.
 */
export function addEntry(database: Database, entry: NewEntry): Database {
  const row: EntryRow = {
    index: nextIndex(database),
    title: requireField("title", entry.title),
    username: requireField("username", entry.username),
    password: requireField("password", entry.password)
  };
  return { header: database.header, entries: [...database.entries, row] };
}

/**
 * Removes the entry whose index equals `index`. Remaining entries keep their indices.
 *
 * @throws {IndexNotFoundError} If no entry carries that index.
 */
export function removeEntry(database: Database, index: number): Database {
  const position = database.entries.findIndex((entry) => entry.index === index);
  if (position === -1) {
    throw new IndexNotFoundError(index);
  }
  return {
    header: database.header,
    entries: database.entries.filter((_, i) => i !== position)
  };
}

/** Header row followed by one row per entry, every cell as text. */
export function toRows(database: Database): string[][] {
  return [
    [...database.header],
    ...database.entries.map((e) => [String(e.index), e.title, e.username, e.password])
  ];
}
