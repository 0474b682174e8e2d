/**
 * @sealnote/crypto - Key Generation and Derivation
 */

export { generateMasterKey } from './master';
export { derivePbkdf2 } from './pbkdf2';
export { deriveArgon2id } from './argon2id';
export {
  derivePassphraseKey,
  currentDefaultKdf,
  parseKdfAlgorithm,
  type DerivePassphraseKeyParams,
} from './derive';
