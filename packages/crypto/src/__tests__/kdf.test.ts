/**
 * @sealnote/crypto - Passphrase KDF Tests
 */

import { describe, it, expect } from 'vitest';
import { pbkdf2Sync } from 'node:crypto';
import {
  derivePassphraseKey,
  derivePbkdf2,
  deriveArgon2id,
  currentDefaultKdf,
  parseKdfAlgorithm,
} from '../keys';
import { generateSalt, utf8ToBytes } from '../utils';
import { CryptoError } from '../types';
import { DERIVED_KEY_SIZE, PBKDF2_ITERATIONS, SALT_SIZE } from '../constants';

const ARGON2_TIMEOUT_MS = 30_000;

describe('Passphrase KDFs', () => {
  describe('PBKDF2-HMAC-SHA256', () => {
    it('should match an independent PBKDF2 implementation', async () => {
      const salt = utf8ToBytes('0123456789abcdef');

      const derived = await derivePbkdf2('horse-battery-123', salt);
      const expected = pbkdf2Sync(
        'horse-battery-123',
        Buffer.from(salt),
        PBKDF2_ITERATIONS,
        DERIVED_KEY_SIZE,
        'sha256'
      );

      expect(derived).toEqual(new Uint8Array(expected));
    });

    it('should be deterministic for the same inputs', async () => {
      const salt = generateSalt();

      const first = await derivePassphraseKey({ passphrase: 'pass', salt, algorithm: 'pbkdf2' });
      const second = await derivePassphraseKey({ passphrase: 'pass', salt, algorithm: 'pbkdf2' });

      expect(first.length).toBe(DERIVED_KEY_SIZE);
      expect(first).toEqual(second);
    });

    it('should give different keys for different salts', async () => {
      const first = await derivePbkdf2('pass', generateSalt());
      const second = await derivePbkdf2('pass', generateSalt());

      expect(first).not.toEqual(second);
    });

    it('should give different keys for different passphrases', async () => {
      const salt = generateSalt();

      expect(await derivePbkdf2('pass-a', salt)).not.toEqual(await derivePbkdf2('pass-b', salt));
    });
  });

  describe('Argon2id', () => {
    it(
      'should be deterministic and salt-sensitive',
      async () => {
        const salt = generateSalt();

        const first = await deriveArgon2id('horse-battery-123', salt);
        const second = await deriveArgon2id('horse-battery-123', salt);
        const otherSalt = await deriveArgon2id('horse-battery-123', generateSalt());

        expect(first.length).toBe(DERIVED_KEY_SIZE);
        expect(first).toEqual(second);
        expect(first).not.toEqual(otherSalt);
      },
      ARGON2_TIMEOUT_MS
    );

    it(
      'should not collide with PBKDF2 for the same inputs',
      async () => {
        const salt = generateSalt();

        const argon = await derivePassphraseKey({ passphrase: 'p', salt, algorithm: 'argon2id' });
        const pbkdf = await derivePassphraseKey({ passphrase: 'p', salt, algorithm: 'pbkdf2' });

        expect(argon).not.toEqual(pbkdf);
      },
      ARGON2_TIMEOUT_MS
    );

    it('should throw UNSUPPORTED_OPERATION when the runtime disallows it', async () => {
      const promise = derivePassphraseKey({
        passphrase: 'p',
        salt: generateSalt(),
        algorithm: 'argon2id',
        allowArgon2id: false,
      });

      await expect(promise).rejects.toBeInstanceOf(CryptoError);
      await expect(promise).rejects.toMatchObject({ code: 'UNSUPPORTED_OPERATION' });
    });

    it('should still allow PBKDF2 when Argon2id is disallowed', async () => {
      const key = await derivePassphraseKey({
        passphrase: 'p',
        salt: generateSalt(),
        algorithm: 'pbkdf2',
        allowArgon2id: false,
      });

      expect(key.length).toBe(DERIVED_KEY_SIZE);
    });
  });

  describe('algorithm selection', () => {
    it('should default new keys to PBKDF2', () => {
      expect(currentDefaultKdf()).toBe('pbkdf2');
    });

    it('should read stored algorithm names', () => {
      expect(parseKdfAlgorithm('pbkdf2')).toBe('pbkdf2');
      expect(parseKdfAlgorithm('argon2id')).toBe('argon2id');
      expect(parseKdfAlgorithm('scrypt')).toBe('argon2id');
      expect(parseKdfAlgorithm(undefined)).toBeUndefined();
      expect(parseKdfAlgorithm(null)).toBeUndefined();
    });

    it('should generate 16-byte salts', () => {
      expect(generateSalt().length).toBe(SALT_SIZE);
    });
  });
});
