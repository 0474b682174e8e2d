import { Logger } from '@nestjs/common';
import {
  base64ToBytes,
  bytesToBase64,
  bytesToUtf8,
  decryptBytes,
  encryptBytes,
  hexToBytes,
  utf8ToBytes,
} from '@sealnote/crypto';
import { E2eeError } from '../errors';
import type { SecureStorageBackend } from './secure-storage-backend.interface';

const STORAGE_KEY_PATTERN = /^[0-9a-fA-F]{64}$/;

/**
 * Seals every value with XChaCha20-Poly1305 under an application-provisioned key
 * before handing it to a non-native backend.
 *
 * Stored form: base64(nonce || ciphertext || tag).
 */
export class SealedStorageBackend implements SecureStorageBackend {
  readonly isNative = false;

  private readonly logger = new Logger(SealedStorageBackend.name);
  private readonly key: Uint8Array;

  constructor(
    private readonly inner: SecureStorageBackend,
    storageKeyHex: string | undefined
  ) {
    if (!storageKeyHex || !STORAGE_KEY_PATTERN.test(storageKeyHex)) {
      throw E2eeError.invalidState('E2EE_STORAGE_KEY must be a 64-character hex string');
    }
    this.key = hexToBytes(storageKeyHex);
  }

  async read(key: string): Promise<string | null> {
    const sealed = await this.inner.read(key);
    if (sealed === null) {
      return null;
    }

    try {
      return bytesToUtf8(decryptBytes(base64ToBytes(sealed), this.key));
    } catch {
      // Unsealable values (other key, legacy plaintext) read as absent
      this.logger.warn(`Discarding unreadable value for ${key}`);
      return null;
    }
  }

  async write(key: string, value: string): Promise<void> {
    await this.inner.write(key, bytesToBase64(encryptBytes(utf8ToBytes(value), this.key)));
  }

  async delete(key: string): Promise<void> {
    await this.inner.delete(key);
  }
}
