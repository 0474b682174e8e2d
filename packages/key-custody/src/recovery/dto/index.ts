export { RecoveryKeyExportDto, RECOVERY_EXPORT_VERSION } from './recovery-key-export.dto';
