/**
 * @sealnote/crypto
 *
 * Cryptographic primitives for end-to-end encrypted notes.
 * Provides XChaCha20-Poly1305 encryption, X25519 key agreement,
 * passphrase key derivation (PBKDF2, Argon2id) and the file envelope.
 *
 * Security principles:
 * - Audited libraries only (@noble/*, argon2) plus Web Crypto for PBKDF2
 * - Error messages are generic to prevent oracle attacks
 * - Nonces are generated inside encryptAead, never passed in
 * - Keys are Uint8Array; base64 is only for the storage boundary
 *
 * @example
 * ```typescript
 * import {
 *   generateMasterKey,
 *   generateX25519Keypair,
 *   computeSharedSecret,
 *   encryptAead,
 *   decryptAead,
 * } from '@sealnote/crypto';
 *
 * // First device wraps the master key for itself
 * const masterKey = generateMasterKey();
 * const device = generateX25519Keypair();
 * const selfKey = computeSharedSecret(device.privateKey, device.publicKey);
 * const wrapped = encryptAead(masterKey, selfKey);
 *
 * // Later: unwrap
 * const unwrapped = decryptAead(wrapped.ciphertext, wrapped.nonce, selfKey);
 * ```
 */

export const CRYPTO_VERSION = '0.1.0';

// XChaCha20-Poly1305 authenticated encryption
export { encryptAead, decryptAead } from './aead';

// File envelope (nonce || ciphertext || tag)
export {
  encryptBytes,
  decryptBytes,
  looksEncrypted,
  encryptedSize,
  plaintextSize,
} from './envelope';

// X25519 key agreement
export { generateX25519Keypair, getX25519PublicKey, computeSharedSecret } from './x25519';

// Master key and passphrase KDFs
export {
  generateMasterKey,
  derivePbkdf2,
  deriveArgon2id,
  derivePassphraseKey,
  currentDefaultKdf,
  parseKdfAlgorithm,
  type DerivePassphraseKeyParams,
} from './keys';

// Utilities
export {
  hexToBytes,
  bytesToHex,
  bytesToBase64,
  base64ToBytes,
  utf8ToBytes,
  bytesToUtf8,
  concatBytes,
  clearBytes,
  clearAll,
  generateRandomBytes,
  generateNonce,
  generateSalt,
  generateRandomId,
} from './utils';

// Types
export type { AeadCiphertext, X25519Keypair, KdfAlgorithm, CryptoErrorCode } from './types';
export { CryptoError } from './types';

// Constants
export {
  AEAD_KEY_SIZE,
  AEAD_NONCE_SIZE,
  AEAD_TAG_SIZE,
  MASTER_KEY_SIZE,
  X25519_PUBLIC_KEY_SIZE,
  X25519_PRIVATE_KEY_SIZE,
  SALT_SIZE,
  DERIVED_KEY_SIZE,
  PBKDF2_ITERATIONS,
  ARGON2ID_TIME_COST,
  ARGON2ID_MEMORY_COST_KIB,
  ARGON2ID_PARALLELISM,
  ENVELOPE_OVERHEAD,
} from './constants';
