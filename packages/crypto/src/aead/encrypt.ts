/**
 * @sealnote/crypto - XChaCha20-Poly1305 Encryption
 *
 * Authenticated encryption for the master key wraps, payloads and files.
 */

import { xchacha20poly1305 } from '@noble/ciphers/chacha';
import { CryptoError } from '../types';
import type { AeadCiphertext } from '../types';
import { AEAD_KEY_SIZE } from '../constants';
import { generateNonce } from '../utils/random';

/**
 * Encrypt data using XChaCha20-Poly1305 under a fresh random nonce.
 *
 * The nonce is generated here on every call and never accepted from the caller,
 * so a nonce can not be reused with the same key by mistake.
 *
 * @param plaintext - Data to encrypt
 * @param key - 32-byte key
 * @returns Nonce and ciphertext (tag appended)
 * @throws CryptoError with generic message on any failure
 */
export function encryptAead(plaintext: Uint8Array, key: Uint8Array): AeadCiphertext {
  if (key.length !== AEAD_KEY_SIZE) {
    throw new CryptoError('Encryption failed', 'INVALID_KEY_SIZE');
  }

  const nonce = generateNonce();

  try {
    const ciphertext = xchacha20poly1305(key, nonce).encrypt(plaintext);
    return { ciphertext, nonce };
  } catch {
    throw new CryptoError('Encryption failed', 'ENCRYPTION_FAILED');
  }
}
