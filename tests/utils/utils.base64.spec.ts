import { base64UrlToBytes, bytesToBase64Url } from "../../src/utils/base64";
import { asArrayBuffer } from "../../src/utils/typedArray";
import { ValidationError } from "../../src/errors";

describe("base64url utils", () => {
  it("encodes without padding using the URL-safe alphabet", () => {
    expect(bytesToBase64Url(new Uint8Array([0xfb, 0xff]))).toBe("-_8");
    expect(bytesToBase64Url(new Uint8Array([]))).toBe("");
    expect(bytesToBase64Url(new Uint8Array([1, 2, 3]).buffer)).toBe("AQID");
  });

  it("decodes back to the same bytes", () => {
    expect(Array.from(base64UrlToBytes("-_8"))).toEqual([0xfb, 0xff]);
    expect(Array.from(base64UrlToBytes("AQID"))).toEqual([1, 2, 3]);
  });

  it("rejects empty, padded, standard-alphabet and impossible lengths", () => {
    expect(() => base64UrlToBytes("")).toThrow(ValidationError);
    expect(() => base64UrlToBytes("AQ==")).toThrow(ValidationError);
    expect(() => base64UrlToBytes("+/8")).toThrow(ValidationError);
    expect(() => base64UrlToBytes("AQIDB")).toThrow(ValidationError);
  });

  it("rejects oversized input", () => {
    expect(() => base64UrlToBytes("A".repeat(1024 * 1024 + 4))).toThrow("Base64url input too large");
  });
});

describe("asArrayBuffer", () => {
  it("returns a buffer holding exactly the viewed bytes", () => {
    const out = asArrayBuffer(new Uint8Array([1, 2, 3]));
    expect(out.byteLength).toBe(3);
    expect(Array.from(new Uint8Array(out))).toEqual([1, 2, 3]);
  });

  it("copies only the viewed bytes of a subarray", () => {
    const u8 = new Uint8Array([1, 2, 3, 4]).subarray(1, 3);
    const out = asArrayBuffer(u8);
    expect(out.byteLength).toBe(2);
    expect(Array.from(new Uint8Array(out))).toEqual([2, 3]);
  });
});
