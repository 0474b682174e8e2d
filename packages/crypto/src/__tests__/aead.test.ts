/**
 * @sealnote/crypto - XChaCha20-Poly1305 Tests
 */

import { describe, it, expect } from 'vitest';
import { encryptAead, decryptAead } from '../aead';
import { generateMasterKey } from '../keys';
import { generateRandomBytes } from '../utils';
import { AEAD_KEY_SIZE, AEAD_NONCE_SIZE, AEAD_TAG_SIZE } from '../constants';
import { CryptoError } from '../types';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

function expectAuthFailure(fn: () => unknown): void {
  const error = captureError(fn);
  expect(error).toBeInstanceOf(CryptoError);
  expect(error).toMatchObject({ code: 'AUTHENTICATION_FAILED', message: 'Decryption failed' });
}

describe('XChaCha20-Poly1305', () => {
  describe('encryptAead / decryptAead round-trip', () => {
    it('should encrypt and decrypt data correctly', () => {
      const key = generateMasterKey();
      const plaintext = new TextEncoder().encode('Hello, notes!');

      const { ciphertext, nonce } = encryptAead(plaintext, key);
      const decrypted = decryptAead(ciphertext, nonce, key);

      expect(new TextDecoder().decode(decrypted)).toBe('Hello, notes!');
    });

    it('should handle empty plaintext', () => {
      const key = generateMasterKey();

      const { ciphertext, nonce } = encryptAead(new Uint8Array(0), key);

      expect(ciphertext.length).toBe(AEAD_TAG_SIZE);
      expect(decryptAead(ciphertext, nonce, key).length).toBe(0);
    });

    it('should round-trip 100KB of random data', () => {
      const key = generateMasterKey();
      const plaintext = generateRandomBytes(100 * 1024);

      const { ciphertext, nonce } = encryptAead(plaintext, key);

      expect(decryptAead(ciphertext, nonce, key)).toEqual(plaintext);
    });

    it('should append a 16-byte tag and return a 24-byte nonce', () => {
      const key = generateMasterKey();
      const plaintext = new Uint8Array([1, 2, 3, 4]);

      const { ciphertext, nonce } = encryptAead(plaintext, key);

      expect(ciphertext.length).toBe(plaintext.length + AEAD_TAG_SIZE);
      expect(nonce.length).toBe(AEAD_NONCE_SIZE);
    });

    it('should use a fresh nonce on every call', () => {
      const key = generateMasterKey();
      const plaintext = new TextEncoder().encode('same input');

      const first = encryptAead(plaintext, key);
      const second = encryptAead(plaintext, key);

      expect(first.nonce).not.toEqual(second.nonce);
      expect(first.ciphertext).not.toEqual(second.ciphertext);
    });
  });

  describe('tamper detection', () => {
    it('should reject every single-bit flip in ciphertext or tag', () => {
      const key = generateMasterKey();
      const { ciphertext, nonce } = encryptAead(new TextEncoder().encode('sixteen byte msg'), key);

      for (let i = 0; i < ciphertext.length; i++) {
        for (let bit = 0; bit < 8; bit++) {
          const tampered = new Uint8Array(ciphertext);
          tampered[i] ^= 1 << bit;
          expectAuthFailure(() => decryptAead(tampered, nonce, key));
        }
      }
    });

    it('should reject a modified nonce', () => {
      const key = generateMasterKey();
      const { ciphertext, nonce } = encryptAead(new Uint8Array([9, 9, 9]), key);
      const badNonce = new Uint8Array(nonce);
      badNonce[0] ^= 0x01;

      expectAuthFailure(() => decryptAead(ciphertext, badNonce, key));
    });

    it('should reject the wrong key', () => {
      const { ciphertext, nonce } = encryptAead(new Uint8Array([1]), generateMasterKey());

      expectAuthFailure(() => decryptAead(ciphertext, nonce, generateMasterKey()));
    });

    it('should reject ciphertext shorter than the tag', () => {
      const key = generateMasterKey();

      expectAuthFailure(() =>
        decryptAead(new Uint8Array(AEAD_TAG_SIZE - 1), new Uint8Array(AEAD_NONCE_SIZE), key)
      );
    });
  });

  describe('input validation', () => {
    it('should reject a key of the wrong size when encrypting', () => {
      expect(() => encryptAead(new Uint8Array(4), new Uint8Array(AEAD_KEY_SIZE - 1))).toThrow(
        'Encryption failed'
      );
    });

    it('should report INVALID_NONCE_SIZE for a 12-byte nonce', () => {
      const key = generateMasterKey();
      const { ciphertext } = encryptAead(new Uint8Array(4), key);

      const error = captureError(() => decryptAead(ciphertext, new Uint8Array(12), key));

      expect(error).toBeInstanceOf(CryptoError);
      expect(error).toMatchObject({ code: 'INVALID_NONCE_SIZE' });
    });
  });
});
