import type { DocumentData } from '../store';

export const PAYLOAD_FORMAT_VERSION = 1;

/** Shown when this device does not hold the master key. */
export const LOCKED_PLACEHOLDER = {
  title: '[Encrypted Note]',
  preview: 'This note is encrypted. Please authorize this device to view it.',
} as const;

/** Shown when a payload does not authenticate under the master key. */
export const DECRYPTION_FAILED_PLACEHOLDER = {
  title: '[Decryption Failed]',
  preview: 'Failed to decrypt this note.',
} as const;

/** Encrypted note as stored. Byte fields are base64. */
export type EncryptedPayload = {
  ciphertext: string;
  nonce: string;
  titleCiphertext?: string;
  titleNonce?: string;
  version: number;
};

export type DecryptedPayload = {
  title: string | null;
  content: string | null;
  preview: string | null;
};

/** Whether a note record carries encrypted content. */
export function isEncrypted(record: DocumentData): boolean {
  return typeof record.e2ee_ciphertext === 'string' && typeof record.e2ee_nonce === 'string';
}

export function toPayloadFields(payload: EncryptedPayload): DocumentData {
  return {
    e2ee_ciphertext: payload.ciphertext,
    e2ee_nonce: payload.nonce,
    ...(payload.titleCiphertext !== undefined && { e2ee_title_ciphertext: payload.titleCiphertext }),
    ...(payload.titleNonce !== undefined && { e2ee_title_nonce: payload.titleNonce }),
    e2ee_version: payload.version,
  };
}

export function parsePayloadFields(record: DocumentData): EncryptedPayload | null {
  const { e2ee_ciphertext, e2ee_nonce, e2ee_title_ciphertext, e2ee_title_nonce, e2ee_version } =
    record;
  if (typeof e2ee_ciphertext !== 'string' || typeof e2ee_nonce !== 'string') {
    return null;
  }
  return {
    ciphertext: e2ee_ciphertext,
    nonce: e2ee_nonce,
    titleCiphertext: typeof e2ee_title_ciphertext === 'string' ? e2ee_title_ciphertext : undefined,
    titleNonce: typeof e2ee_title_nonce === 'string' ? e2ee_title_nonce : undefined,
    version: typeof e2ee_version === 'number' ? e2ee_version : PAYLOAD_FORMAT_VERSION,
  };
}
