/**
 * @sealnote/crypto - Random Generation Utilities
 *
 * CSPRNG access through the Web Crypto API (`globalThis.crypto` on Node.js 20).
 */

import { CryptoError } from '../types';
import { AEAD_NONCE_SIZE, SALT_SIZE } from '../constants';
import { bytesToHex } from './encoding';

/** getRandomValues refuses requests above this many bytes */
const MAX_RANDOM_CHUNK = 65_536;

/**
 * Generate cryptographically secure random bytes.
 *
 * @param length - Number of bytes to generate
 * @throws CryptoError if crypto.getRandomValues is unavailable
 */
export function generateRandomBytes(length: number): Uint8Array {
  if (typeof crypto === 'undefined' || typeof crypto.getRandomValues !== 'function') {
    throw new CryptoError('Secure random generation unavailable', 'RANDOM_GENERATION_FAILED');
  }

  const bytes = new Uint8Array(length);
  for (let offset = 0; offset < length; offset += MAX_RANDOM_CHUNK) {
    crypto.getRandomValues(bytes.subarray(offset, Math.min(offset + MAX_RANDOM_CHUNK, length)));
  }
  return bytes;
}

/**
 * Generate a fresh 192-bit XChaCha20 nonce.
 *
 * Random nonces of this size are safe to generate per message without a counter.
 */
export function generateNonce(): Uint8Array {
  return generateRandomBytes(AEAD_NONCE_SIZE);
}

/** Generate a 16-byte passphrase salt. */
export function generateSalt(): Uint8Array {
  return generateRandomBytes(SALT_SIZE);
}

/**
 * Generate an opaque random identifier (128 bits, hex).
 * Used for device ids, which must not be derivable from device properties.
 */
export function generateRandomId(): string {
  return bytesToHex(generateRandomBytes(16));
}
