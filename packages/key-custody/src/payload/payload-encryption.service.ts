import { Injectable, Logger } from '@nestjs/common';
import {
  base64ToBytes,
  bytesToBase64,
  bytesToUtf8,
  decryptAead,
  decryptBytes,
  encryptAead,
  encryptBytes,
  looksEncrypted,
  utf8ToBytes,
} from '@sealnote/crypto';
import { DeviceTrustService } from '../device-trust';
import { E2eeError, errorMessage } from '../errors';
import type { DocumentData } from '../store';
import {
  DECRYPTION_FAILED_PLACEHOLDER,
  LOCKED_PLACEHOLDER,
  PAYLOAD_FORMAT_VERSION,
  isEncrypted,
  parsePayloadFields,
  toPayloadFields,
} from './payload-record';
import type { DecryptedPayload, EncryptedPayload } from './payload-record';
import { previewText } from './preview';

/** Plaintext fields moved into the ciphertext on upload. */
const PLAINTEXT_FIELDS = ['title', 'content', 'plain_text'] as const;

const optionalText = (value: unknown): string | null => (typeof value === 'string' ? value : null);

/**
 * Note and attachment encryption under the master key.
 */
@Injectable()
export class PayloadEncryptionService {
  private readonly logger = new Logger(PayloadEncryptionService.name);

  constructor(private readonly deviceTrust: DeviceTrustService) {}

  async isAvailable(): Promise<boolean> {
    return this.deviceTrust.hasMasterKey();
  }

  /**
   * Encrypt `{title, content}` as one JSON document, and the title on its own when
   * non-empty.
   */
  async encrypt(title?: string | null, content?: string | null): Promise<EncryptedPayload> {
    const masterKey = await this.requireMasterKey();

    const body = encryptAead(
      utf8ToBytes(JSON.stringify({ title: title ?? null, content: content ?? null })),
      masterKey
    );
    const encryptedTitle = title ? encryptAead(utf8ToBytes(title), masterKey) : null;

    return {
      ciphertext: bytesToBase64(body.ciphertext),
      nonce: bytesToBase64(body.nonce),
      ...(encryptedTitle && {
        titleCiphertext: bytesToBase64(encryptedTitle.ciphertext),
        titleNonce: bytesToBase64(encryptedTitle.nonce),
      }),
      version: PAYLOAD_FORMAT_VERSION,
    };
  }

  /**
   * @throws E2eeError NOT_AUTHORIZED without the master key, AUTHENTICATION_FAILURE when
   *   the payload does not authenticate, INVALID_STATE for a malformed payload
   */
  async decrypt(payload: EncryptedPayload): Promise<DecryptedPayload> {
    const masterKey = await this.requireMasterKey();

    let plaintext: Uint8Array;
    try {
      plaintext = decryptAead(
        this.decodeField(payload.ciphertext, 'e2ee_ciphertext'),
        this.decodeField(payload.nonce, 'e2ee_nonce'),
        masterKey
      );
    } catch (error) {
      throw E2eeError.fromCrypto(error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(bytesToUtf8(plaintext));
    } catch {
      throw E2eeError.invalidState('Decrypted payload is not JSON');
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw E2eeError.invalidState('Decrypted payload is not an object');
    }

    const title = 'title' in parsed ? optionalText(parsed.title) : null;
    const content = 'content' in parsed ? optionalText(parsed.content) : null;
    return { title, content, preview: previewText(content) };
  }

  /**
   * Replace a note's plaintext fields with encrypted ones.
   * Without the master key the note is returned unchanged.
   */
  async prepareForUpload(note: DocumentData): Promise<DocumentData> {
    if (!(await this.isAvailable())) {
      this.logger.warn('Master key unavailable, note uploaded without encryption');
      return { ...note };
    }

    const encrypted = await this.encrypt(optionalText(note.title), optionalText(note.content));
    const prepared: DocumentData = { ...note };
    for (const field of PLAINTEXT_FIELDS) {
      delete prepared[field];
    }
    return { ...prepared, ...toPayloadFields(encrypted), e2ee_enabled: true };
  }

  /**
   * Fill `title`, `content` and `plain_text` of a downloaded note.
   *
   * Unencrypted notes pass through. A locked device or a payload that does not open gets
   * placeholder text instead of an error.
   */
  async processFromDownload(record: DocumentData): Promise<DocumentData> {
    const payload = parsePayloadFields(record);
    if (!payload) {
      return { ...record };
    }

    if (!(await this.isAvailable())) {
      this.logger.debug('Encrypted note received while the master key is unavailable');
      return this.withPlaceholder(record, LOCKED_PLACEHOLDER);
    }

    try {
      const decrypted = await this.decrypt(payload);
      return {
        ...record,
        title: decrypted.title,
        content: decrypted.content,
        plain_text: decrypted.preview,
      };
    } catch (error) {
      this.logger.error(`Failed to decrypt note: ${errorMessage(error)}`);
      return this.withPlaceholder(record, DECRYPTION_FAILED_PLACEHOLDER);
    }
  }

  isEncrypted(record: DocumentData): boolean {
    return isEncrypted(record);
  }

  /** Seal attachment bytes as nonce ‖ ciphertext ‖ tag. */
  async encryptFile(bytes: Uint8Array): Promise<Uint8Array> {
    return encryptBytes(bytes, await this.requireMasterKey());
  }

  /** @throws E2eeError AUTHENTICATION_FAILURE for tampered, truncated or foreign data */
  async decryptFile(bytes: Uint8Array): Promise<Uint8Array> {
    const masterKey = await this.requireMasterKey();
    try {
      return decryptBytes(bytes, masterKey);
    } catch (error) {
      throw E2eeError.fromCrypto(error);
    }
  }

  /** Heuristic: false for common media signatures and for buffers too short to be sealed. */
  looksEncrypted(bytes: Uint8Array): boolean {
    return looksEncrypted(bytes);
  }

  private withPlaceholder(
    record: DocumentData,
    placeholder: { readonly title: string; readonly preview: string }
  ): DocumentData {
    return { ...record, title: placeholder.title, content: null, plain_text: placeholder.preview };
  }

  private async requireMasterKey(): Promise<Uint8Array> {
    const masterKey = await this.deviceTrust.getMasterKey();
    if (!masterKey) {
      throw E2eeError.notAuthorized('Master key is not available on this device');
    }
    return masterKey;
  }

  private decodeField(value: string, field: string): Uint8Array {
    try {
      return base64ToBytes(value);
    } catch {
      throw E2eeError.invalidState(`Payload field ${field} is not valid base64`);
    }
  }
}
