import { Inject, Injectable, Logger } from '@nestjs/common';
import { base64ToBytes, bytesToBase64 } from '@sealnote/crypto';
import type { X25519Keypair } from '@sealnote/crypto';
import { SECURE_STORAGE_BACKEND } from './secure-storage-backend.interface';
import type { SecureStorageBackend } from './secure-storage-backend.interface';

/** Logical names of every value this store persists. */
export const SECURE_STORE_KEYS = {
  devicePrivateKey: 'e2ee_device_private_key',
  devicePublicKey: 'e2ee_device_public_key',
  deviceId: 'e2ee_device_id',
  masterKeyCache: 'e2ee_umk_cache',
  rememberDevice: 'e2ee_remember_device',
  deviceStatus: 'e2ee_device_status',
  signInProgress: 'e2ee_sign_in_progress',
} as const;

/** Last settled trust status, used for fast startup. */
export type CachedDeviceStatus = 'approved' | 'pending' | 'revoked' | 'needs_recovery';

const CACHED_STATUSES: readonly CachedDeviceStatus[] = [
  'approved',
  'pending',
  'revoked',
  'needs_recovery',
];

function isCachedDeviceStatus(value: string): value is CachedDeviceStatus {
  return CACHED_STATUSES.some((status) => status === value);
}

/**
 * Device-local secrets: keypair, device id, cached master key and status flags.
 */
@Injectable()
export class SecureKeyStoreService {
  private readonly logger = new Logger(SecureKeyStoreService.name);

  constructor(
    @Inject(SECURE_STORAGE_BACKEND)
    private readonly backend: SecureStorageBackend
  ) {}

  async saveDeviceIdentity(deviceId: string, keypair: X25519Keypair): Promise<void> {
    await this.backend.write(SECURE_STORE_KEYS.devicePrivateKey, bytesToBase64(keypair.privateKey));
    await this.backend.write(SECURE_STORE_KEYS.devicePublicKey, bytesToBase64(keypair.publicKey));
    await this.backend.write(SECURE_STORE_KEYS.deviceId, deviceId);
  }

  async saveDeviceKeypair(keypair: X25519Keypair): Promise<void> {
    await this.backend.write(SECURE_STORE_KEYS.devicePrivateKey, bytesToBase64(keypair.privateKey));
    await this.backend.write(SECURE_STORE_KEYS.devicePublicKey, bytesToBase64(keypair.publicKey));
  }

  async getDeviceId(): Promise<string | null> {
    return this.backend.read(SECURE_STORE_KEYS.deviceId);
  }

  async getDeviceKeypair(): Promise<X25519Keypair | null> {
    const privateKey = await this.readBytes(SECURE_STORE_KEYS.devicePrivateKey);
    const publicKey = await this.readBytes(SECURE_STORE_KEYS.devicePublicKey);
    if (!privateKey || !publicKey) {
      return null;
    }
    return { privateKey, publicKey };
  }

  /** True only when private key, public key and device id are all present. */
  async hasDeviceKeys(): Promise<boolean> {
    const keypair = await this.getDeviceKeypair();
    const deviceId = await this.getDeviceId();
    return keypair !== null && deviceId !== null;
  }

  async cacheMasterKey(masterKey: Uint8Array): Promise<void> {
    await this.backend.write(SECURE_STORE_KEYS.masterKeyCache, bytesToBase64(masterKey));
  }

  async getCachedMasterKey(): Promise<Uint8Array | null> {
    return this.readBytes(SECURE_STORE_KEYS.masterKeyCache);
  }

  async clearCachedMasterKey(): Promise<void> {
    await this.backend.delete(SECURE_STORE_KEYS.masterKeyCache);
  }

  async setRememberDevice(remember: boolean): Promise<void> {
    await this.backend.write(SECURE_STORE_KEYS.rememberDevice, String(remember));
  }

  /** Defaults to true when never set. */
  async getRememberDevice(): Promise<boolean> {
    const value = await this.backend.read(SECURE_STORE_KEYS.rememberDevice);
    if (value === null) {
      return true;
    }
    return value.toLowerCase() === 'true';
  }

  async cacheDeviceStatus(status: CachedDeviceStatus): Promise<void> {
    await this.backend.write(SECURE_STORE_KEYS.deviceStatus, status);
  }

  async getCachedDeviceStatus(): Promise<CachedDeviceStatus | null> {
    const value = await this.backend.read(SECURE_STORE_KEYS.deviceStatus);
    if (value === null || !isCachedDeviceStatus(value)) {
      return null;
    }
    return value;
  }

  async clearDeviceStatus(): Promise<void> {
    await this.backend.delete(SECURE_STORE_KEYS.deviceStatus);
  }

  /** Set before sign-in starts, cleared when it completes. */
  async setSignInProgress(inProgress: boolean): Promise<void> {
    if (inProgress) {
      await this.backend.write(SECURE_STORE_KEYS.signInProgress, 'true');
    } else {
      await this.backend.delete(SECURE_STORE_KEYS.signInProgress);
    }
  }

  /** A flag left behind means the previous sign-in never finished. */
  async wasSignInInterrupted(): Promise<boolean> {
    return (await this.backend.read(SECURE_STORE_KEYS.signInProgress)) === 'true';
  }

  /** Remove every value this store owns (logout, orphaned keys, fresh start). */
  async clearAll(): Promise<void> {
    for (const key of Object.values(SECURE_STORE_KEYS)) {
      await this.backend.delete(key);
    }
  }

  private async readBytes(key: string): Promise<Uint8Array | null> {
    const value = await this.backend.read(key);
    if (value === null) {
      return null;
    }
    try {
      return base64ToBytes(value);
    } catch {
      this.logger.warn(`Stored value for ${key} is not valid base64, ignoring it`);
      return null;
    }
  }
}
