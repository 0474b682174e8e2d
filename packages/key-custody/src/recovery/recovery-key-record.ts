import { parseKdfAlgorithm } from '@sealnote/crypto';
import type { KdfAlgorithm } from '@sealnote/crypto';
import type { DocumentData, DocumentSnapshot } from '../store';

/**
 * Passphrase-wrapped master key. `kdfAlgorithm` is absent on legacy and imported
 * records, which are opened by trying PBKDF2 and then Argon2id.
 */
export type RecoveryKeyRecord = {
  encryptedUmk: string;
  nonce: string;
  salt: string;
  hint?: string;
  createdAt: string;
  kdfAlgorithm?: KdfAlgorithm;
  imported?: boolean;
};

const requiredString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

/** null for a missing document or one lacking ciphertext, nonce or salt. */
export function parseRecoveryKeyRecord(snapshot: DocumentSnapshot): RecoveryKeyRecord | null {
  const data = snapshot.data;
  if (!data) {
    return null;
  }

  const encryptedUmk = requiredString(data.encrypted_umk);
  const nonce = requiredString(data.nonce);
  const salt = requiredString(data.salt);
  if (!encryptedUmk || !nonce || !salt) {
    return null;
  }

  return {
    encryptedUmk,
    nonce,
    salt,
    hint: requiredString(data.hint),
    createdAt: typeof data.created_at === 'string' ? data.created_at : '',
    kdfAlgorithm: parseKdfAlgorithm(requiredString(data.kdf_algorithm)),
    imported: data.imported === true ? true : undefined,
  };
}

export function toRecoveryKeyDocument(record: RecoveryKeyRecord): DocumentData {
  return {
    encrypted_umk: record.encryptedUmk,
    nonce: record.nonce,
    salt: record.salt,
    ...(record.hint !== undefined && { hint: record.hint }),
    created_at: record.createdAt,
    ...(record.kdfAlgorithm !== undefined && { kdf_algorithm: record.kdfAlgorithm }),
    ...(record.imported && { imported: true }),
  };
}
