/**
 * @sealnote/crypto - X25519 Keypair Generation
 */

import { x25519 } from '@noble/curves/ed25519';
import { CryptoError } from '../types';
import type { X25519Keypair } from '../types';
import { X25519_PRIVATE_KEY_SIZE } from '../constants';
import { generateRandomBytes } from '../utils/random';

/**
 * Generate a new X25519 keypair for a device.
 *
 * The private key is 32 CSPRNG bytes; clamping happens inside the scalar multiply.
 */
export function generateX25519Keypair(): X25519Keypair {
  const privateKey = generateRandomBytes(X25519_PRIVATE_KEY_SIZE);
  const publicKey = x25519.getPublicKey(privateKey);

  return { publicKey, privateKey };
}

/**
 * Recompute the public key for a stored private key.
 *
 * @throws CryptoError if the private key is not 32 bytes
 */
export function getX25519PublicKey(privateKey: Uint8Array): Uint8Array {
  if (privateKey.length !== X25519_PRIVATE_KEY_SIZE) {
    throw new CryptoError('Invalid private key', 'INVALID_PRIVATE_KEY_SIZE');
  }
  return x25519.getPublicKey(privateKey);
}
