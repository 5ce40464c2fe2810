// src/utils/typedArray.ts
export function asArrayBuffer(u8: Uint8Array): ArrayBuffer {
  const { buffer } = u8;
  if (buffer instanceof ArrayBuffer && u8.byteOffset === 0 && u8.byteLength === buffer.byteLength) {
    return buffer;
  }
  const copy = new ArrayBuffer(u8.byteLength);
  new Uint8Array(copy).set(u8);
  return copy;
}
