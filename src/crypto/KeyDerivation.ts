import { webcrypto } from "node:crypto";
import * as argon2 from "argon2";
import { MPM_CONSTANTS } from "../constants";
import { CryptoError, ValidationError } from "../errors";
import type { CellKeys, KdfParams } from "../types";
import { asArrayBuffer } from "../utils/typedArray";

const AES_KEY_BYTES = MPM_CONSTANTS.AES.LENGTH / 8;

export function resolveKdfParams(params?: Partial<KdfParams>): KdfParams {
  return {
    timeCost: params?.timeCost ?? MPM_CONSTANTS.ARGON2.TIME_COST,
    memoryKiB: params?.memoryKiB ?? MPM_CONSTANTS.ARGON2.MEMORY_KIB,
    parallelism: params?.parallelism ?? MPM_CONSTANTS.ARGON2.PARALLELISM
  };
}

function assertKdfParams({ timeCost, memoryKiB, parallelism }: KdfParams): void {
  if (!Number.isInteger(timeCost) || timeCost < 1 || timeCost > MPM_CONSTANTS.ARGON2.MAX_TIME_COST) {
    throw new ValidationError(`timeCost must be an integer in [1, ${MPM_CONSTANTS.ARGON2.MAX_TIME_COST}]`);
  }
  if (!Number.isInteger(memoryKiB) || memoryKiB < MPM_CONSTANTS.ARGON2.MIN_MEMORY_KIB) {
    throw new ValidationError(`memoryKiB must be an integer >= ${MPM_CONSTANTS.ARGON2.MIN_MEMORY_KIB}`);
  }
  if (!Number.isInteger(parallelism) || parallelism < 1) {
    throw new ValidationError("parallelism must be a positive integer");
  }
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Derives the AES-GCM and HMAC cell keys from a master passphrase with Argon2id.
 * The salt is fixed, so the same passphrase always yields the same keys.
 */
export async function deriveCellKeys(
  passphrase: string,
  params: KdfParams = resolveKdfParams()
): Promise<CellKeys> {
  if (typeof passphrase !== "string" || passphrase.length === 0) {
    throw new ValidationError("Passphrase must be a non-empty string");
  }
  assertKdfParams(params);

  let raw: Buffer;
  try {
    raw = await argon2.hash(passphrase, {
      type: argon2.argon2id,
      raw: true,
      salt: Buffer.from(MPM_CONSTANTS.ARGON2.SALT, "utf8"),
      timeCost: params.timeCost,
      memoryCost: params.memoryKiB,
      parallelism: params.parallelism,
      hashLength: MPM_CONSTANTS.ARGON2.HASH_LEN
    });
  } catch (e) {
    throw new CryptoError(`Argon2 derivation failed: ${describe(e)}`);
  }

  if (!raw || raw.byteLength !== MPM_CONSTANTS.ARGON2.HASH_LEN) {
    throw new CryptoError(
      `Argon2 returned invalid hash size (expected ${MPM_CONSTANTS.ARGON2.HASH_LEN} bytes)`
    );
  }

  const material = new Uint8Array(raw);
  try {
    const encKey = await webcrypto.subtle.importKey(
      "raw",
      asArrayBuffer(material.subarray(0, AES_KEY_BYTES)),
      { name: MPM_CONSTANTS.AES.NAME, length: MPM_CONSTANTS.AES.LENGTH },
      false,
      ["encrypt", "decrypt"]
    );
    const macKey = await webcrypto.subtle.importKey(
      "raw",
      asArrayBuffer(material.subarray(AES_KEY_BYTES)),
      { name: MPM_CONSTANTS.HMAC.NAME, hash: MPM_CONSTANTS.HMAC.HASH },
      false,
      ["sign"]
    );
    return { encKey, macKey };
  } catch (e) {
    throw new CryptoError(`Failed to import derived key: ${describe(e)}`);
  } finally {
    material.fill(0);
    raw.fill(0);
  }
}
