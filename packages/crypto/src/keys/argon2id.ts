/**
 * @sealnote/crypto - Argon2id Key Derivation
 *
 * Memory-hard KDF kept for recovery keys created before PBKDF2 became the default.
 * The native binding hashes on the libuv thread pool, so the 64 MiB / 3-pass run
 * does not block the event loop.
 */

import * as argon2 from 'argon2';
import { CryptoError } from '../types';
import {
  ARGON2ID_MEMORY_COST_KIB,
  ARGON2ID_PARALLELISM,
  ARGON2ID_TIME_COST,
  DERIVED_KEY_SIZE,
} from '../constants';

/**
 * Derive a 32-byte key from a passphrase with Argon2id.
 *
 * Parameters are pinned: t=3, m=64 MiB, p=4.
 *
 * @throws CryptoError if derivation fails
 */
export async function deriveArgon2id(passphrase: string, salt: Uint8Array): Promise<Uint8Array> {
  try {
    const hash = await argon2.hash(passphrase, {
      type: argon2.argon2id,
      raw: true,
      salt: Buffer.from(salt),
      hashLength: DERIVED_KEY_SIZE,
      timeCost: ARGON2ID_TIME_COST,
      memoryCost: ARGON2ID_MEMORY_COST_KIB,
      parallelism: ARGON2ID_PARALLELISM,
    });

    return new Uint8Array(hash);
  } catch {
    throw new CryptoError('Key derivation failed', 'KEY_DERIVATION_FAILED');
  }
}
