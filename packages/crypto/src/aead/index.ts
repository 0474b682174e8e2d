/**
 * @sealnote/crypto - AEAD Module
 */

export { encryptAead } from './encrypt';
export { decryptAead } from './decrypt';
