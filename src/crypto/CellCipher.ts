import { timingSafeEqual, webcrypto } from "node:crypto";
import { MPM_CONSTANTS } from "../constants";
import { CryptoError, ValidationError } from "../errors";
import type { CellKeys, KdfParams } from "../types";
import { base64UrlToBytes, bytesToBase64Url } from "../utils/base64";
import { asArrayBuffer } from "../utils/typedArray";
import { deriveCellKeys, resolveKdfParams } from "./KeyDerivation";
import { SessionKeyCache } from "./SessionKeyCache";

const MIN_CELL_BYTES = MPM_CONSTANTS.AES.IV_LENGTH + MPM_CONSTANTS.AES.TAG_LENGTH;

/**
 * Keyed, deterministic, reversible transform of a single text cell.
 *
 * Each cell is AES-256-GCM encrypted under an IV taken from an HMAC of the
 * plaintext (a synthetic IV), so equal plaintexts under one passphrase give
 * equal ciphertexts and a wrong passphrase fails authentication instead of
 * producing text. The cell on disk is `base64url(iv || ciphertext || tag)`.
 */
export class CellCipher {
  private readonly session = new SessionKeyCache();
  private readonly kdf: KdfParams;

  constructor(kdf?: Partial<KdfParams>) {
    this.kdf = resolveKdfParams(kdf);
  }

  /** Derives (or reuses) the cell keys for a passphrase. */
  async keysFor(passphrase: string): Promise<CellKeys> {
    const cached = this.session.match(passphrase, this.kdf);
    if (cached) return cached;

    const keys = await deriveCellKeys(passphrase, this.kdf);
    this.session.set(keys, passphrase, this.kdf);
    return keys;
  }

  async encode(plaintext: string, passphrase: string): Promise<string> {
    return this.encodeWithKeys(plaintext, await this.keysFor(passphrase));
  }

  async decode(ciphertext: string, passphrase: string): Promise<string> {
    return this.decodeWithKeys(ciphertext, await this.keysFor(passphrase));
  }

  async encodeWithKeys(plaintext: string, keys: CellKeys): Promise<string> {
    if (typeof plaintext !== "string") {
      throw new ValidationError("Cell plaintext must be a string");
    }

    const pt = new Uint8Array(Buffer.from(plaintext, "utf8"));
    const iv = await this.syntheticIv(keys, pt);

    let ct: ArrayBuffer;
    try {
      ct = await webcrypto.subtle.encrypt(
        { name: MPM_CONSTANTS.AES.NAME, iv: asArrayBuffer(iv) },
        keys.encKey,
        asArrayBuffer(pt)
      );
    } catch (e) {
      throw new CryptoError(`Encryption failed: ${e instanceof Error ? e.message : String(e)}`);
    }

    const out = new Uint8Array(iv.byteLength + ct.byteLength);
    out.set(iv, 0);
    out.set(new Uint8Array(ct), iv.byteLength);
    return bytesToBase64Url(out);
  }

  /**
   * @throws {CryptoError} If the cell is malformed or was not produced under these keys.
   */
  async decodeWithKeys(ciphertext: string, keys: CellKeys): Promise<string> {
    let bytes: Uint8Array;
    try {
      bytes = base64UrlToBytes(ciphertext);
    } catch (e) {
      if (e instanceof ValidationError) throw new CryptoError("Cell is not valid ciphertext");
      throw e;
    }
    if (bytes.byteLength < MIN_CELL_BYTES) {
      throw new CryptoError("Cell is too short to be ciphertext");
    }

    const iv = bytes.subarray(0, MPM_CONSTANTS.AES.IV_LENGTH);
    const ct = bytes.subarray(MPM_CONSTANTS.AES.IV_LENGTH);

    let pt: Uint8Array;
    try {
      pt = new Uint8Array(
        await webcrypto.subtle.decrypt(
          { name: MPM_CONSTANTS.AES.NAME, iv: asArrayBuffer(iv) },
          keys.encKey,
          asArrayBuffer(ct)
        )
      );
    } catch {
      throw new CryptoError("Invalid key or data.");
    }

    const expectedIv = await this.syntheticIv(keys, pt);
    if (!timingSafeEqual(expectedIv, iv)) {
      throw new CryptoError("Invalid key or data.");
    }
    return Buffer.from(pt).toString("utf8");
  }

  /** Drops cached keys; the next call derives them again. */
  clear(): void {
    this.session.clear();
  }

  private async syntheticIv(keys: CellKeys, pt: Uint8Array): Promise<Uint8Array> {
    try {
      const mac = await webcrypto.subtle.sign(MPM_CONSTANTS.HMAC.NAME, keys.macKey, asArrayBuffer(pt));
      return new Uint8Array(mac).slice(0, MPM_CONSTANTS.AES.IV_LENGTH);
    } catch (e) {
      throw new CryptoError(`Failed to derive cell IV: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
}
