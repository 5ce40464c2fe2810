import "./../setup";
import { TEST_KDF, argon2HashMock } from "./../setup";
import { deriveCellKeys, resolveKdfParams } from "../../src/crypto/KeyDerivation";
import { CryptoError, ValidationError } from "../../src/errors";
import { MPM_CONSTANTS } from "../../src/constants";

describe("KeyDerivation", () => {
  it("validates the passphrase", async () => {
    await expect(deriveCellKeys("", TEST_KDF)).rejects.toBeInstanceOf(ValidationError);
    await expect(deriveCellKeys(undefined as unknown as string, TEST_KDF)).rejects.toBeInstanceOf(ValidationError);
  });

  it("produces an AES-GCM key and an HMAC key", async () => {
    const keys = await deriveCellKeys("test-secret", TEST_KDF);
    expect(keys.encKey.algorithm.name).toBe("AES-GCM");
    expect(keys.encKey.usages.sort()).toEqual(["decrypt", "encrypt"]);
    expect(keys.encKey.extractable).toBe(false);
    expect(keys.macKey.algorithm.name).toBe("HMAC");
    expect(keys.macKey.usages).toEqual(["sign"]);
  });

  it("asks Argon2id for 64 raw bytes under the fixed salt", async () => {
    const hash = argon2HashMock();
    hash.mockClear();
    await deriveCellKeys("test-secret", TEST_KDF);

    expect(hash).toHaveBeenCalledTimes(1);
    const [pass, opts] = hash.mock.calls[0];
    expect(pass).toBe("test-secret");
    expect(opts).toMatchObject({
      type: 2,
      raw: true,
      timeCost: 1,
      memoryCost: 1024,
      parallelism: 1,
      hashLength: 64
    });
    expect(opts.salt.toString("utf8")).toBe(MPM_CONSTANTS.ARGON2.SALT);
  });

  it("wraps argon2 failures as CryptoError", async () => {
    argon2HashMock().mockRejectedValueOnce(new Error("boom"));
    await expect(deriveCellKeys("test-secret", TEST_KDF)).rejects.toThrow("Argon2 derivation failed: boom");
    await expect(deriveCellKeys("test-secret", TEST_KDF)).resolves.toBeDefined();
  });

  it("rejects a hash of the wrong size", async () => {
    argon2HashMock().mockResolvedValueOnce(Buffer.alloc(16));
    await expect(deriveCellKeys("test-secret", TEST_KDF)).rejects.toBeInstanceOf(CryptoError);
  });
});

describe("KeyDerivation - parameter validation", () => {
  it("fills defaults for missing parameters", () => {
    expect(resolveKdfParams()).toEqual({ timeCost: 3, memoryKiB: 65536, parallelism: 1 });
    expect(resolveKdfParams({ timeCost: 5 })).toEqual({ timeCost: 5, memoryKiB: 65536, parallelism: 1 });
  });

  it("rejects non-integer or out-of-range time costs", async () => {
    for (const timeCost of [0, 1.5, -1, 10_000]) {
      await expect(deriveCellKeys("pw", { ...TEST_KDF, timeCost })).rejects.toBeInstanceOf(ValidationError);
    }
  });

  it("rejects too little memory and non-positive parallelism", async () => {
    await expect(deriveCellKeys("pw", { ...TEST_KDF, memoryKiB: 8 })).rejects.toBeInstanceOf(ValidationError);
    await expect(deriveCellKeys("pw", { ...TEST_KDF, parallelism: 0 })).rejects.toBeInstanceOf(ValidationError);
  });
});
