/**
 * @sealnote/crypto - X25519 Module
 */

export { generateX25519Keypair, getX25519PublicKey } from './keygen';
export { computeSharedSecret } from './shared-secret';
