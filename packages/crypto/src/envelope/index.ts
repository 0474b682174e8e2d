/**
 * @sealnote/crypto - File Envelope Module
 */

export { encryptBytes, decryptBytes } from './seal';
export { looksEncrypted, encryptedSize, plaintextSize } from './detect';
