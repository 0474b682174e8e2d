/**
 * @sealnote/crypto - Passphrase Key Derivation
 *
 * Algorithm dispatch for recovery passphrases.
 */

import { CryptoError } from '../types';
import type { KdfAlgorithm } from '../types';
import { derivePbkdf2 } from './pbkdf2';
import { deriveArgon2id } from './argon2id';

/**
 * Parameters for passphrase key derivation.
 */
export type DerivePassphraseKeyParams = {
  passphrase: string;
  /** 16-byte salt stored beside the wrapped key */
  salt: Uint8Array;
  algorithm: KdfAlgorithm;
  /**
   * Whether this runtime may run the memory-hard KDF (defaults to true).
   * Memory-constrained targets pass false and get UNSUPPORTED_OPERATION.
   */
  allowArgon2id?: boolean;
};

/**
 * Derive a 32-byte wrapping key from a passphrase.
 *
 * Pure function of (passphrase, salt, algorithm).
 *
 * @throws CryptoError `UNSUPPORTED_OPERATION` for Argon2id when not allowed
 *
 * @example
 * ```typescript
 * const salt = generateSalt();
 * const key = await derivePassphraseKey({
 *   passphrase: 'correct horse',
 *   salt,
 *   algorithm: currentDefaultKdf(),
 * });
 * ```
 */
export async function derivePassphraseKey(params: DerivePassphraseKeyParams): Promise<Uint8Array> {
  const { passphrase, salt, algorithm, allowArgon2id = true } = params;

  switch (algorithm) {
    case 'pbkdf2':
      return derivePbkdf2(passphrase, salt);
    case 'argon2id':
      if (!allowArgon2id) {
        throw new CryptoError('Argon2id is not supported on this runtime', 'UNSUPPORTED_OPERATION');
      }
      return deriveArgon2id(passphrase, salt);
  }
}

/** KDF used for every newly created recovery key. */
export function currentDefaultKdf(): KdfAlgorithm {
  return 'pbkdf2';
}

/**
 * Read a stored `kdf_algorithm` value.
 *
 * Absent means a legacy record (undefined: discover by trial). Unrecognised names
 * are read as Argon2id, the only algorithm that predates the field.
 */
export function parseKdfAlgorithm(name: string | null | undefined): KdfAlgorithm | undefined {
  if (name === undefined || name === null) {
    return undefined;
  }
  return name === 'pbkdf2' ? 'pbkdf2' : 'argon2id';
}
