/**
 * @sealnote/crypto - PBKDF2 Key Derivation
 *
 * PBKDF2-HMAC-SHA256 using Web Crypto API. Portable default for new recovery keys.
 */

import { CryptoError } from '../types';
import { DERIVED_KEY_SIZE, PBKDF2_HASH, PBKDF2_ITERATIONS } from '../constants';

/**
 * Derive a 32-byte key from a passphrase with PBKDF2-HMAC-SHA256 (310,000 iterations).
 *
 * @throws CryptoError if derivation fails
 */
export async function derivePbkdf2(passphrase: string, salt: Uint8Array): Promise<Uint8Array> {
  try {
    // Copy to get plain ArrayBuffers (not SharedArrayBuffer or subviews)
    const passphraseBuffer = new Uint8Array(new TextEncoder().encode(passphrase))
      .buffer as ArrayBuffer;
    const saltBuffer = new Uint8Array(salt).buffer as ArrayBuffer;

    const keyMaterial = await crypto.subtle.importKey(
      'raw',
      passphraseBuffer,
      'PBKDF2',
      false, // not extractable
      ['deriveBits']
    );

    const derivedBits = await crypto.subtle.deriveBits(
      {
        name: 'PBKDF2',
        hash: PBKDF2_HASH,
        salt: saltBuffer,
        iterations: PBKDF2_ITERATIONS,
      },
      keyMaterial,
      DERIVED_KEY_SIZE * 8 // deriveBits takes length in bits
    );

    return new Uint8Array(derivedBits);
  } catch {
    throw new CryptoError('Key derivation failed', 'KEY_DERIVATION_FAILED');
  }
}
