/**
 * @sealnote/crypto - Encoding Utilities
 *
 * Conversions between bytes and the string forms stored in documents.
 */

const HEX_PATTERN = /^[0-9a-fA-F]*$/;
const BASE64_PATTERN =/^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Convert hex string to Uint8Array.
 *
 * @param hex - Hex string, optional 0x prefix
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;

  if (cleanHex.length % 2 !== 0) {
    throw new Error('Invalid hex string: odd length');
  }

  if (!HEX_PATTERN.test(cleanHex)) {
    throw new Error('Invalid hex string: non-hex character');
  }

  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(cleanHex.substring(i * 2, i * 2 + 2), 16);
  }

  return bytes;
}

/** Convert bytes to lowercase hex without prefix. */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Encode bytes as standard (padded) base64.
 */
export function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Decode standard base64 into a fresh Uint8Array.
 *
 * @throws Error if the input is not padded base64
 */
export function base64ToBytes(base64: string): Uint8Array {
  if (!BASE64_PATTERN.test(base64)) {
    throw new Error('Invalid base64 string');
  }
  return new Uint8Array(Buffer.from(base64, 'base64'));
}

/** UTF-8 encode a string. */
export function utf8ToBytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/**
 * UTF-8 decode bytes. Invalid sequences throw rather than being replaced,
 * so a wrong key that slips past authentication cannot produce garbage text.
 */
export function bytesToUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

/**
 * Concatenate multiple Uint8Arrays into one.
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);

  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }

  return result;
}
