/**
 * @sealnote/crypto - File Envelope
 *
 * Self-contained encrypted blobs for attachments and local files.
 *
 * Format: Nonce (24 bytes) || Ciphertext || Tag (16 bytes)
 */

import { CryptoError } from '../types';
import { AEAD_KEY_SIZE, AEAD_NONCE_SIZE, ENVELOPE_OVERHEAD } from '../constants';
import { concatBytes } from '../utils/encoding';
import { encryptAead } from '../aead/encrypt';
import { decryptAead } from '../aead/decrypt';

/**
 * Encrypt bytes into a file envelope with the nonce prepended.
 *
 * @param plaintext - File contents, may be empty
 * @param key - 32-byte key
 * @returns Nonce || ciphertext || tag
 */
export function encryptBytes(plaintext: Uint8Array, key: Uint8Array): Uint8Array {
  const { nonce, ciphertext } = encryptAead(plaintext, key);
  return concatBytes(nonce, ciphertext);
}

/**
 * Open a file envelope produced by encryptBytes.
 *
 * @throws CryptoError `AUTHENTICATION_FAILED` on truncated or tampered input
 */
export function decryptBytes(envelope: Uint8Array, key: Uint8Array): Uint8Array {
  if (key.length !== AEAD_KEY_SIZE) {
    throw new CryptoError('Decryption failed', 'INVALID_KEY_SIZE');
  }

  if (envelope.length < ENVELOPE_OVERHEAD) {
    throw new CryptoError('Decryption failed', 'AUTHENTICATION_FAILED');
  }

  const nonce = envelope.slice(0, AEAD_NONCE_SIZE);
  const ciphertext = envelope.slice(AEAD_NONCE_SIZE);

  return decryptAead(ciphertext, nonce, key);
}
