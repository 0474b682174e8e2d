/**
 * @sealnote/crypto - Master Key Generation
 */

import { MASTER_KEY_SIZE } from '../constants';
import { generateRandomBytes } from '../utils/random';

/**
 * Generate a new 256-bit user master key.
 *
 * Called once per key generation: first-device setup or a fresh start.
 */
export function generateMasterKey(): Uint8Array {
  return generateRandomBytes(MASTER_KEY_SIZE);
}
