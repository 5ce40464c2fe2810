import "./../setup";
import { TEST_KDF } from "./../setup";
import { CellCipher } from "../../src/crypto/CellCipher";
import { base64UrlToBytes, bytesToBase64Url } from "../../src/utils/base64";
import { CryptoError, ValidationError } from "../../src/errors";

describe("CellCipher", () => {
  const cipher = new CellCipher(TEST_KDF);

  afterEach(() => cipher.clear());

  it("round-trips printable, empty and non-ASCII cells", async () => {
    const cells = [
      "index",
      "",
      "Hogwarts Students Online",
      "ron.weasley@magic.wiz",
      "iLuvCakes123!",
      "a,b \"quoted\" line1\nline2\r\n",
      "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~",
      "Zürich – café ☕ 東京 🚀"
    ];
    for (const cell of cells) {
      const encoded = await cipher.encode(cell, "test-secret");
      expect(await cipher.decode(encoded, "test-secret")).toBe(cell);
    }
  });

  it("never produces an empty cell, even for empty plaintext", async () => {
    const encoded = await cipher.encode("", "test-secret");
    // 12-byte IV + 16-byte tag, base64url without padding
    expect(encoded).toHaveLength(38);
    expect(encoded).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it("is deterministic for a given passphrase", async () => {
    const a = await cipher.encode("username", "test-secret");
    cipher.clear();
    const b = await new CellCipher(TEST_KDF).encode("username", "test-secret");
    expect(a).toBe(b);
  });

  it("encodes differently under different passphrases and for different plaintexts", async () => {
    const a = await cipher.encode("title", "passphrase-one");
    const b = await cipher.encode("title", "passphrase-two");
    const c = await cipher.encode("titles", "passphrase-one");
    expect(a).not.toBe(b);
    expect(a).not.toBe(c);
  });

  it("rejects decoding with the wrong passphrase", async () => {
    const encoded = await cipher.encode("index", "right-pass");
    await expect(cipher.decode(encoded, "wrong-pass")).rejects.toBeInstanceOf(CryptoError);
  });

  it("rejects tampered ciphertext", async () => {
    const encoded = await cipher.encode("secret value", "test-secret");
    const bytes = base64UrlToBytes(encoded);
    bytes[bytes.length - 1] = bytes[bytes.length - 1] ^ 0x01;
    await expect(cipher.decode(bytesToBase64Url(bytes), "test-secret")).rejects.toBeInstanceOf(CryptoError);
  });

  it("rejects malformed cells as CryptoError", async () => {
    await expect(cipher.decode("", "test-secret")).rejects.toBeInstanceOf(CryptoError);
    await expect(cipher.decode("not base64!", "test-secret")).rejects.toBeInstanceOf(CryptoError);
    await expect(cipher.decode("index", "test-secret")).rejects.toBeInstanceOf(CryptoError);
  });

  it("rejects an empty passphrase", async () => {
    await expect(cipher.encode("x", "")).rejects.toBeInstanceOf(ValidationError);
    await expect(cipher.decode("x", "")).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("CellCipher - key caching", () => {
  it("derives keys once per passphrase until cleared", async () => {
    const cipher = new CellCipher(TEST_KDF);
    const first = await cipher.keysFor("test-secret");
    expect(await cipher.keysFor("test-secret")).toBe(first);

    const other = await cipher.keysFor("another-secret");
    expect(other).not.toBe(first);

    cipher.clear();
    expect(await cipher.keysFor("another-secret")).not.toBe(other);
  });
});
