import type { webcrypto } from "node:crypto";
import { MPM_CONSTANTS } from "./constants";

export type HeaderRow = typeof MPM_CONSTANTS.HEADER;

export interface EntryRow {
  index: number;       // non-negative, unique within a database
  title: string;
  username: string;
  password: string;
}

export interface Database {
  readonly header: HeaderRow;
  readonly entries: readonly EntryRow[];
}

export interface NewEntry {
  title: string;
  username: string;
  password: string;
}

/** Keys derived from one master passphrase; never persisted. */
export interface CellKeys {
  encKey: webcrypto.CryptoKey; // AES-GCM
  macKey: webcrypto.CryptoKey; // HMAC-SHA-256, yields the synthetic IV
}

export interface KdfParams {
  timeCost: number;
  memoryKiB: number;
  parallelism: number;
}

/**
 * A decoded database paired with the keys it was opened under.
 * Saving re-encodes with these keys, so the passphrase itself never
 * has to outlive the call that supplied it.
 */
export interface OpenDatabase {
  readonly path: string;
  readonly database: Database;
  readonly keys: CellKeys;
}
