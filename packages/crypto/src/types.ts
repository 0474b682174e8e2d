/**
 * @sealnote/crypto - Type Definitions
 *
 * Core types for cryptographic operations.
 */

/**
 * Result of XChaCha20-Poly1305 encryption.
 * Nonce and ciphertext are kept separate because records store them in separate fields.
 */
export type AeadCiphertext = {
  /** Encrypted data with the 16-byte Poly1305 tag appended */
  ciphertext: Uint8Array;
  /** 24-byte random nonce */
  nonce: Uint8Array;
};

/** X25519 keypair held by a single device. */
export type X25519Keypair = {
  /** 32-byte public key, published in the device record */
  publicKey: Uint8Array;
  /** 32-byte private key, never leaves the device */
  privateKey: Uint8Array;
};

/** Passphrase KDFs. Names match the `kdf_algorithm` values written to stored records. */
export type KdfAlgorithm = 'pbkdf2' | 'argon2id';

/**
 * Error codes for categorized error handling.
 * Generic messages are still used externally to prevent oracle attacks.
 */
export type CryptoErrorCode =
  | 'ENCRYPTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'INVALID_KEY_SIZE'
  | 'INVALID_NONCE_SIZE'
  | 'INVALID_PUBLIC_KEY_SIZE'
  | 'INVALID_PRIVATE_KEY_SIZE'
  | 'KEY_AGREEMENT_FAILED'
  | 'KEY_DERIVATION_FAILED'
  | 'UNSUPPORTED_OPERATION'
  | 'RANDOM_GENERATION_FAILED';

/**
 * Error raised by every primitive in this package.
 * `code` is for internal handling; `message` stays generic.
 */
export class CryptoError extends Error {
  readonly code: CryptoErrorCode;

  constructor(message: string, code: CryptoErrorCode) {
    super(message);
    this.name = 'CryptoError';
    this.code = code;

    // Maintain proper stack trace for V8
    const ErrorWithCapture = Error as typeof Error & {
      captureStackTrace?: (target: object, constructor: unknown) => void;
    };
    if (ErrorWithCapture.captureStackTrace) {
      ErrorWithCapture.captureStackTrace(this, CryptoError);
    }
  }
}
