import { ValidationError } from "../errors";

const MAX_BASE64_LEN = 1024 * 1024;
const BASE64URL_RE = /^[A-Za-z0-9_-]+$/;

export function bytesToBase64Url(bytes: ArrayBuffer | Uint8Array): string {
  const u8 = bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes);
  if (u8.byteLength === 0) return "";
  return Buffer.from(u8.buffer, u8.byteOffset, u8.byteLength).toString("base64url");
}

export function base64UrlToBytes(b64: string): Uint8Array {
  if (typeof b64 !== "string" || b64.length === 0) {
    throw new ValidationError("Base64url input must be a non-empty string");
  }
  if (b64.length > MAX_BASE64_LEN) {
    throw new ValidationError("Base64url input too large");
  }
  // a single trailing sextet cannot encode a whole byte
  if (!BASE64URL_RE.test(b64) || b64.length % 4 === 1) {
    throw new ValidationError("Invalid base64url input");
  }

  const buf = Buffer.from(b64, "base64url");
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}
