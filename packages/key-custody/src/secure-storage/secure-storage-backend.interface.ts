/**
 * Platform key-value storage for device secrets.
 *
 * Native backends (OS keychain, keystore) protect values themselves. Values on
 * non-native backends are sealed before they reach the backend.
 */
export interface SecureStorageBackend {
  readonly isNative: boolean;

  read(key: string): Promise<string | null>;

  write(key: string, value: string): Promise<void>;

  delete(key: string): Promise<void>;
}

export const SECURE_STORAGE_BACKEND = 'SECURE_STORAGE_BACKEND';
