import type { ConfigService } from '@nestjs/config';

export interface E2eeOptions {
  /** false on memory-constrained runtimes: Argon2id then fails with UNSUPPORTED_OPERATION */
  allowArgon2id: boolean;
  /** Poll period while this device waits for approval */
  approvalPollIntervalMs: number;
  /** Pending requests older than this are purged */
  pendingDeviceTtlMs: number;
  /** 64-hex key sealing values on non-native storage backends */
  storageKeyHex?: string;
}

export const E2EE_OPTIONS = 'E2EE_OPTIONS';

export const DEFAULT_E2EE_OPTIONS: E2eeOptions = {
  allowArgon2id: true,
  approvalPollIntervalMs: 30_000,
  pendingDeviceTtlMs: 24 * 60 * 60 * 1000,
};

function readBoolean(value: string | boolean): boolean {
  return typeof value === 'boolean' ? value : value.trim().toLowerCase() === 'true';
}

function readPositiveInt(key: string, value: string | number): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Build options from environment-backed config.
 */
export function e2eeOptionsFromConfig(configService: ConfigService): E2eeOptions {
  return {
    allowArgon2id: readBoolean(
      configService.get<string | boolean>('E2EE_ALLOW_ARGON2ID', DEFAULT_E2EE_OPTIONS.allowArgon2id)
    ),
    approvalPollIntervalMs: readPositiveInt(
      'E2EE_APPROVAL_POLL_INTERVAL_MS',
      configService.get<string | number>(
        'E2EE_APPROVAL_POLL_INTERVAL_MS',
        DEFAULT_E2EE_OPTIONS.approvalPollIntervalMs
      )
    ),
    pendingDeviceTtlMs: readPositiveInt(
      'E2EE_PENDING_DEVICE_TTL_MS',
      configService.get<string | number>(
        'E2EE_PENDING_DEVICE_TTL_MS',
        DEFAULT_E2EE_OPTIONS.pendingDeviceTtlMs
      )
    ),
    storageKeyHex: configService.get<string>('E2EE_STORAGE_KEY'),
  };
}
