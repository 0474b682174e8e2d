import type { SecureStorageBackend } from './secure-storage-backend.interface';

/**
 * Process-local storage. Nothing survives a restart.
 *
 * Marked non-native by default so values pass through the sealing layer,
 * the same path a browser localStorage backend takes.
 */
export class MemoryStorageBackend implements SecureStorageBackend {
  private readonly values = new Map<string, string>();

  constructor(readonly isNative = false) {}

  async read(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }

  /** Raw stored keys, for inspection in tests. */
  keys(): string[] {
    return [...this.values.keys()];
  }
}
