/**
 * @sealnote/crypto - Constants
 *
 * Cryptographic parameters and sizes. The KDF parameters are a compatibility
 * contract: every stored recovery key was derived with them.
 */

/** XChaCha20-Poly1305 key size in bytes (256 bits) */
export const AEAD_KEY_SIZE = 32;

/** XChaCha20-Poly1305 nonce size in bytes (192 bits), random per encryption */
export const AEAD_NONCE_SIZE = 24;

/** Poly1305 authentication tag size in bytes (128 bits), appended to ciphertext */
export const AEAD_TAG_SIZE = 16;

/** User master key size in bytes */
export const MASTER_KEY_SIZE = 32;

/** X25519 public key size in bytes */
export const X25519_PUBLIC_KEY_SIZE = 32;

/** X25519 private key size in bytes */
export const X25519_PRIVATE_KEY_SIZE = 32;

/** Passphrase salt size in bytes */
export const SALT_SIZE = 16;

/** Output size of both passphrase KDFs in bytes */
export const DERIVED_KEY_SIZE = 32;

/** PBKDF2-HMAC-SHA256 iteration count */
export const PBKDF2_ITERATIONS = 310_000;

/** Hash used by PBKDF2 (Web Crypto name) */
export const PBKDF2_HASH = 'SHA-256';

/** Argon2id iterations */
export const ARGON2ID_TIME_COST = 3;

/** Argon2id memory in KiB (64 MiB) */
export const ARGON2ID_MEMORY_COST_KIB = 65_536;

/** Argon2id lanes */
export const ARGON2ID_PARALLELISM = 4;

/** File envelope overhead: nonce prefix plus tag suffix */
export const ENVELOPE_OVERHEAD = AEAD_NONCE_SIZE + AEAD_TAG_SIZE;
