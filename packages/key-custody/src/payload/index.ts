export { PayloadEncryptionService } from './payload-encryption.service';
export {
  DECRYPTION_FAILED_PLACEHOLDER,
  LOCKED_PLACEHOLDER,
  PAYLOAD_FORMAT_VERSION,
  isEncrypted,
  parsePayloadFields,
  toPayloadFields,
  type DecryptedPayload,
  type EncryptedPayload,
} from './payload-record';
export { PREVIEW_MAX_LENGTH, previewText } from './preview';
