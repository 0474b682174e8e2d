export { RecoveryKeyService, type RecoveryStatusCallback } from './recovery-key.service';
export {
  parseRecoveryKeyRecord,
  toRecoveryKeyDocument,
  type RecoveryKeyRecord,
} from './recovery-key-record';
export { RecoveryKeyExportDto, RECOVERY_EXPORT_VERSION } from './dto';
