import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import {
  MASTER_KEY_SIZE,
  base64ToBytes,
  bytesToBase64,
  clearBytes,
  currentDefaultKdf,
  decryptAead,
  derivePassphraseKey,
  encryptAead,
  generateSalt,
  parseKdfAlgorithm,
} from '@sealnote/crypto';
import type { AeadCiphertext, KdfAlgorithm } from '@sealnote/crypto';
import { DeviceTrustService } from '../device-trust';
import { E2eeError, errorMessage, hasE2eeCode } from '../errors';
import { E2EE_OPTIONS } from '../e2ee-options';
import type { E2eeOptions } from '../e2ee-options';
import { ACCOUNT_SESSION } from '../session';
import type { AccountSession } from '../session';
import { DOCUMENT_STORE, accountPaths } from '../store';
import type { DocumentStore } from '../store';
import { RECOVERY_EXPORT_VERSION, RecoveryKeyExportDto } from './dto';
import { parseRecoveryKeyRecord, toRecoveryKeyDocument } from './recovery-key-record';
import type { RecoveryKeyRecord } from './recovery-key-record';

/** Progress messages reported while recovering. */
export type RecoveryStatusCallback = (status: string) => void;

/** Order tried for records that do not name their KDF. */
const LEGACY_KDF_ORDER: readonly KdfAlgorithm[] = ['pbkdf2', 'argon2id'];

/**
 * Passphrase backup of the master key, stored as the account's `e2ee/recovery_key` record.
 *
 * Knowing the passphrase is proof of authorization: `recover` registers this device as
 * approved without any other device taking part.
 */
@Injectable()
export class RecoveryKeyService {
  private readonly logger = new Logger(RecoveryKeyService.name);

  constructor(
    @Inject(DOCUMENT_STORE)
    private readonly store: DocumentStore,
    @Inject(ACCOUNT_SESSION)
    private readonly session: AccountSession,
    @Inject(E2EE_OPTIONS)
    private readonly options: E2eeOptions,
    private readonly deviceTrust: DeviceTrustService
  ) {}

  async hasRecoveryKey(): Promise<boolean> {
    return (await this.loadRecord()) !== null;
  }

  async getHint(): Promise<string | null> {
    return (await this.loadRecord())?.hint ?? null;
  }

  /**
   * Wrap the current master key under a passphrase-derived key, replacing any existing record.
   *
   * @throws E2eeError NOT_AUTHORIZED when this device does not hold the master key
   */
  async create(passphrase: string, hint?: string): Promise<void> {
    const masterKey = await this.deviceTrust.getMasterKey();
    if (!masterKey) {
      throw E2eeError.notAuthorized('Master key is not available on this device');
    }

    const salt = generateSalt();
    const algorithm = currentDefaultKdf();
    const wrappingKey = await this.deriveKey(passphrase, salt, algorithm);

    let wrapped: AeadCiphertext;
    try {
      wrapped = encryptAead(masterKey, wrappingKey);
    } finally {
      clearBytes(wrappingKey);
    }

    const record: RecoveryKeyRecord = {
      encryptedUmk: bytesToBase64(wrapped.ciphertext),
      nonce: bytesToBase64(wrapped.nonce),
      salt: bytesToBase64(salt),
      hint,
      createdAt: new Date().toISOString(),
      kdfAlgorithm: algorithm,
    };

    await this.store.set(this.recoveryPath(), toRecoveryKeyDocument(record));
    this.logger.log(`Recovery key created with ${algorithm}`);
  }

  /**
   * Pass/fail check of a passphrase against the stored record.
   *
   * @throws E2eeError UNSUPPORTED_OPERATION when the record needs Argon2id and it is disabled
   */
  async verify(passphrase: string): Promise<boolean> {
    const record = await this.loadRecord();
    if (!record) {
      return false;
    }
    const masterKey = await this.openRecord(record, passphrase);
    clearBytes(masterKey);
    return masterKey !== null;
  }

  /** Re-wrap under a new passphrase. The current passphrase must verify first. */
  async update(currentPassphrase: string, newPassphrase: string, hint?: string): Promise<void> {
    await this.requireValidPassphrase(currentPassphrase);
    await this.create(newPassphrase, hint);
    this.logger.log('Recovery key updated');
  }

  /** Delete the record. The current passphrase must verify first. */
  async remove(currentPassphrase: string): Promise<void> {
    await this.requireValidPassphrase(currentPassphrase);
    await this.store.delete(this.recoveryPath());
    this.logger.log('Recovery key removed');
  }

  /**
   * Delete the record without a passphrase. Only for starting fresh, when the record
   * wraps a master key that is being abandoned.
   */
  async discard(): Promise<void> {
    await this.store.delete(this.recoveryPath());
    this.logger.warn('Recovery key discarded');
  }

  /**
   * Open the record with a passphrase and register this device as approved.
   *
   * Returns false when there is no record, the passphrase is wrong, or registration fails.
   *
   * @throws E2eeError UNSUPPORTED_OPERATION when Argon2id is needed and disabled here;
   *   the user must recover from another device
   */
  async recover(passphrase: string, onStatusChange?: RecoveryStatusCallback): Promise<boolean> {
    onStatusChange?.('Fetching recovery data...');
    const record = await this.loadRecord();
    if (!record) {
      this.logger.warn('Recovery requested but no recovery key exists');
      return false;
    }

    let masterKey: Uint8Array | null = null;
    try {
      onStatusChange?.('Decrypting recovery key...');
      masterKey = await this.openRecord(record, passphrase);
      if (!masterKey) {
        this.logger.warn('Recovery failed: incorrect passphrase');
        return false;
      }

      onStatusChange?.('Registering device...');
      await this.deviceTrust.registerRecoveredDevice(masterKey);
      this.logger.log('Recovery successful');
      return true;
    } catch (error) {
      if (hasE2eeCode(error, 'UNSUPPORTED_OPERATION')) {
        throw error;
      }
      this.logger.error(`Recovery failed: ${errorMessage(error)}`);
      return false;
    } finally {
      clearBytes(masterKey);
    }
  }

  /** JSON backup of the record, or null when there is none. */
  async exportRecoveryKey(): Promise<string | null> {
    const record = await this.loadRecord();
    if (!record) {
      return null;
    }
    return JSON.stringify({
      version: RECOVERY_EXPORT_VERSION,
      encrypted_umk: record.encryptedUmk,
      nonce: record.nonce,
      salt: record.salt,
      created_at: record.createdAt,
      ...(record.kdfAlgorithm && { kdf_algorithm: record.kdfAlgorithm }),
    });
  }

  /** Replace the account's record with an exported backup. false for malformed input. */
  async importRecoveryKey(exported: string): Promise<boolean> {
    const dto = this.parseExport(exported);
    if (!dto) {
      return false;
    }

    const record: RecoveryKeyRecord = {
      encryptedUmk: dto.encrypted_umk,
      nonce: dto.nonce,
      salt: dto.salt,
      createdAt: dto.created_at ?? new Date().toISOString(),
      kdfAlgorithm: parseKdfAlgorithm(dto.kdf_algorithm),
      imported: true,
    };

    await this.store.set(this.recoveryPath(), toRecoveryKeyDocument(record));
    this.logger.log('Recovery key imported');
    return true;
  }

  private parseExport(exported: string): RecoveryKeyExportDto | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(exported);
    } catch (error) {
      this.logger.warn(`Recovery import is not JSON: ${errorMessage(error)}`);
      return null;
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      this.logger.warn('Recovery import is not a JSON object');
      return null;
    }

    const dto = plainToInstance(RecoveryKeyExportDto, parsed);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const fields = errors.map((error) => error.property).join(', ');
      this.logger.warn(`Recovery import rejected, invalid fields: ${fields}`);
      return null;
    }
    return dto;
  }

  private async requireValidPassphrase(passphrase: string): Promise<void> {
    if (!(await this.verify(passphrase))) {
      throw new E2eeError('Current passphrase is incorrect', 'AUTHENTICATION_FAILURE');
    }
  }

  /** Master key bytes, or null when the passphrase does not open the record. */
  private async openRecord(
    record: RecoveryKeyRecord,
    passphrase: string
  ): Promise<Uint8Array | null> {
    const salt = this.decodeField(record.salt, 'salt');
    const ciphertext = this.decodeField(record.encryptedUmk, 'encrypted_umk');
    const nonce = this.decodeField(record.nonce, 'nonce');

    const algorithms = record.kdfAlgorithm ? [record.kdfAlgorithm] : LEGACY_KDF_ORDER;
    for (const algorithm of algorithms) {
      const wrappingKey = await this.deriveKey(passphrase, salt, algorithm);
      try {
        const masterKey = decryptAead(ciphertext, nonce, wrappingKey);
        if (masterKey.length === MASTER_KEY_SIZE) {
          return masterKey;
        }
        clearBytes(masterKey);
      } catch {
        this.logger.debug(`Recovery key did not open with ${algorithm}`);
      } finally {
        clearBytes(wrappingKey);
      }
    }
    return null;
  }

  private async deriveKey(
    passphrase: string,
    salt: Uint8Array,
    algorithm: KdfAlgorithm
  ): Promise<Uint8Array> {
    try {
      return await derivePassphraseKey({
        passphrase,
        salt,
        algorithm,
        allowArgon2id: this.options.allowArgon2id,
      });
    } catch (error) {
      throw E2eeError.fromCrypto(error);
    }
  }

  private decodeField(value: string, field: string): Uint8Array {
    try {
      return base64ToBytes(value);
    } catch {
      throw E2eeError.invalidState(`Recovery record field ${field} is not valid base64`);
    }
  }

  private async loadRecord(): Promise<RecoveryKeyRecord | null> {
    return parseRecoveryKeyRecord(await this.store.get(this.recoveryPath()));
  }

  private recoveryPath(): string {
    const accountId = this.session.currentAccountId();
    if (!accountId) {
      throw E2eeError.invalidState('No signed-in account');
    }
    return accountPaths(accountId).recoveryKey;
  }
}
