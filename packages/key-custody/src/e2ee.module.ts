import { Module } from '@nestjs/common';
import type { DynamicModule, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { DeviceTrustService } from './device-trust';
import { DEFAULT_E2EE_OPTIONS, E2EE_OPTIONS, e2eeOptionsFromConfig } from './e2ee-options';
import type { E2eeOptions } from './e2ee-options';
import { E2eeService } from './orchestrator';
import { PayloadEncryptionService } from './payload';
import { RecoveryKeyService } from './recovery';
import { SECURE_STORAGE_BACKEND, SealedStorageBackend, SecureKeyStoreService } from './secure-storage';
import type { SecureStorageBackend } from './secure-storage';
import { ACCOUNT_SESSION, DEVICE_INFO_PROVIDER, NodeDeviceInfoProvider } from './session';
import type { AccountSession, DeviceInfoProvider } from './session';
import { DOCUMENT_STORE } from './store';
import type { DocumentStore } from './store';

/** Host-provided implementations of the external interfaces. */
export type E2eeCollaborators = {
  documentStore: DocumentStore;
  accountSession: AccountSession;
  storageBackend: SecureStorageBackend;
  /** Defaults to the host OS */
  deviceInfo?: DeviceInfoProvider;
};

const SERVICES = [
  SecureKeyStoreService,
  DeviceTrustService,
  RecoveryKeyService,
  PayloadEncryptionService,
  E2eeService,
];

/** Non-native backends get every value sealed under the configured storage key. */
function secureStorageFor(backend: SecureStorageBackend, options: E2eeOptions): SecureStorageBackend {
  if (backend.isNative) {
    return backend;
  }
  return new SealedStorageBackend(backend, options.storageKeyHex);
}

@Module({})
export class E2eeModule {
  static forRoot(collaborators: E2eeCollaborators, options: Partial<E2eeOptions> = {}): DynamicModule {
    return {
      module: E2eeModule,
      providers: [
        { provide: E2EE_OPTIONS, useValue: { ...DEFAULT_E2EE_OPTIONS, ...options } },
        ...E2eeModule.coreProviders(collaborators),
      ],
      exports: SERVICES,
    };
  }

  static forRootAsync(collaborators: E2eeCollaborators): DynamicModule {
    return {
      module: E2eeModule,
      imports: [ConfigModule],
      providers: [
        {
          provide: E2EE_OPTIONS,
          useFactory: (configService: ConfigService): E2eeOptions =>
            e2eeOptionsFromConfig(configService),
          inject: [ConfigService],
        },
        ...E2eeModule.coreProviders(collaborators),
      ],
      exports: SERVICES,
    };
  }

  private static coreProviders(collaborators: E2eeCollaborators): Provider[] {
    return [
      { provide: DOCUMENT_STORE, useValue: collaborators.documentStore },
      { provide: ACCOUNT_SESSION, useValue: collaborators.accountSession },
      collaborators.deviceInfo
        ? { provide: DEVICE_INFO_PROVIDER, useValue: collaborators.deviceInfo }
        : { provide: DEVICE_INFO_PROVIDER, useClass: NodeDeviceInfoProvider },
      {
        provide: SECURE_STORAGE_BACKEND,
        useFactory: (options: E2eeOptions): SecureStorageBackend =>
          secureStorageFor(collaborators.storageBackend, options),
        inject: [E2EE_OPTIONS],
      },
      ...SERVICES,
    ];
  }
}
