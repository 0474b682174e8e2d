/**
 * @sealnote/crypto - Utilities
 *
 * Re-exports for encoding, memory, and random utilities.
 */

export {
  hexToBytes,
  bytesToHex,
  bytesToBase64,
  base64ToBytes,
  utf8ToBytes,
  bytesToUtf8,
  concatBytes,
} from './encoding';
export { clearBytes, clearAll } from './memory';
export { generateRandomBytes, generateNonce, generateSalt, generateRandomId } from './random';
