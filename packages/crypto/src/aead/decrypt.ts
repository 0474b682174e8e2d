/**
 * @sealnote/crypto - XChaCha20-Poly1305 Decryption
 */

import { xchacha20poly1305 } from '@noble/ciphers/chacha';
import { CryptoError } from '../types';
import { AEAD_KEY_SIZE, AEAD_NONCE_SIZE, AEAD_TAG_SIZE } from '../constants';

/**
 * Decrypt data encrypted with XChaCha20-Poly1305.
 *
 * The tag is verified before any plaintext is returned. Wrong key, wrong nonce
 * and modified ciphertext all fail the same way.
 *
 * @param ciphertext - Encrypted data with the 16-byte tag appended
 * @param nonce - 24-byte nonce used at encryption
 * @param key - 32-byte key
 * @throws CryptoError `AUTHENTICATION_FAILED` when the tag does not verify
 */
export function decryptAead(
  ciphertext: Uint8Array,
  nonce: Uint8Array,
  key: Uint8Array
): Uint8Array {
  if (key.length !== AEAD_KEY_SIZE) {
    throw new CryptoError('Decryption failed', 'INVALID_KEY_SIZE');
  }

  if (nonce.length !== AEAD_NONCE_SIZE) {
    throw new CryptoError('Decryption failed', 'INVALID_NONCE_SIZE');
  }

  // Shorter than a tag can never authenticate
  if (ciphertext.length < AEAD_TAG_SIZE) {
    throw new CryptoError('Decryption failed', 'AUTHENTICATION_FAILED');
  }

  try {
    return xchacha20poly1305(key, nonce).decrypt(ciphertext);
  } catch {
    // Generic error to prevent oracle attacks
    throw new CryptoError('Decryption failed', 'AUTHENTICATION_FAILED');
  }
}
