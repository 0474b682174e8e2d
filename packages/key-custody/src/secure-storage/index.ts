export { SECURE_STORAGE_BACKEND, type SecureStorageBackend } from './secure-storage-backend.interface';
export { MemoryStorageBackend } from './memory.backend';
export { SealedStorageBackend } from './sealed.backend';
export {
  SecureKeyStoreService,
  SECURE_STORE_KEYS,
  type CachedDeviceStatus,
} from './secure-key-store.service';
