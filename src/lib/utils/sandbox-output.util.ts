/**
 * Sandbox output utilities - Byte conversions for the sandbox file API
 */

/**
 * Convert sandbox file data to Buffer
 */
export function toBuffer(data: Buffer | Uint8Array | ArrayBuffer): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Copy bytes into a standalone ArrayBuffer for the sandbox file API
 */
export function toArrayBuffer(data: Buffer | Uint8Array): ArrayBuffer {
  const arrayBuffer = new ArrayBuffer(data.byteLength);
  new Uint8Array(arrayBuffer).set(data);
  return arrayBuffer;
}
