/**
 * @sealnote/crypto - X25519 Key Agreement
 *
 * The raw shared secret is used directly as the key for wrapping the master key.
 * There is no HKDF step: every device must compute bit-identical wrap keys, and the
 * records already in the store were written this way.
 */

import { x25519 } from '@noble/curves/ed25519';
import { CryptoError } from '../types';
import { X25519_PRIVATE_KEY_SIZE, X25519_PUBLIC_KEY_SIZE } from '../constants';

/**
 * Compute the X25519 shared secret between our private key and their public key.
 *
 * computeSharedSecret(a.priv, b.pub) equals computeSharedSecret(b.priv, a.pub).
 * Passing a device's own keypair gives the self-wrap key used by the first device.
 *
 * @returns 32-byte shared secret
 * @throws CryptoError on wrong sizes or a low-order public key
 */
export function computeSharedSecret(privateKey: Uint8Array, publicKey: Uint8Array): Uint8Array {
  if (privateKey.length !== X25519_PRIVATE_KEY_SIZE) {
    throw new CryptoError('Key agreement failed', 'INVALID_PRIVATE_KEY_SIZE');
  }

  if (publicKey.length !== X25519_PUBLIC_KEY_SIZE) {
    throw new CryptoError('Key agreement failed', 'INVALID_PUBLIC_KEY_SIZE');
  }

  try {
    // noble rejects an all-zero result (low-order point)
    return x25519.getSharedSecret(privateKey, publicKey);
  } catch {
    throw new CryptoError('Key agreement failed', 'KEY_AGREEMENT_FAILED');
  }
}
