import { base64ToBytes, bytesToBase64, bytesToUtf8, decryptAead } from '@sealnote/crypto';
import { InMemoryDocumentStore } from '../testing';
import { createTestDevice, requireMasterKey } from '../testing/test-device';
import type { TestDevice } from '../testing/test-device';
import { DECRYPTION_FAILED_PLACEHOLDER, LOCKED_PLACEHOLDER } from './payload-record';

describe('PayloadEncryptionService', () => {
  let store: InMemoryDocumentStore;
  let a: TestDevice;
  let locked: TestDevice;

  beforeEach(async () => {
    store = new InMemoryDocumentStore();
    a = await createTestDevice(store, { name: 'Desktop A' });
    await a.trust.registerFirstDevice();
    locked = await createTestDevice(store, { name: 'Laptop B' });
  });

  afterEach(async () => {
    await a.close();
    await locked.close();
  });

  describe('encrypt and decrypt', () => {
    it('should seal title and content together and the title alone', async () => {
      const payload = await a.payload.encrypt('Shopping', 'milk');
      const masterKey = await requireMasterKey(a);

      expect(payload.version).toBe(1);
      const body = decryptAead(
        base64ToBytes(payload.ciphertext),
        base64ToBytes(payload.nonce),
        masterKey
      );
      expect(JSON.parse(bytesToUtf8(body))).toEqual({ title: 'Shopping', content: 'milk' });
      const title = decryptAead(
        base64ToBytes(payload.titleCiphertext ?? ''),
        base64ToBytes(payload.titleNonce ?? ''),
        masterKey
      );
      expect(bytesToUtf8(title)).toBe('Shopping');

      expect(await a.payload.decrypt(payload)).toEqual({
        title: 'Shopping',
        content: 'milk',
        preview: 'milk',
      });
    });

    it('should omit the title ciphertext for an empty title', async () => {
      const payload = await a.payload.encrypt('', null);

      expect(payload.titleCiphertext).toBeUndefined();
      expect(payload.titleNonce).toBeUndefined();
      expect(await a.payload.decrypt(payload)).toEqual({
        title: '',
        content: null,
        preview: null,
      });
    });

    it('should use fresh nonces for identical input', async () => {
      const first = await a.payload.encrypt('Same', 'same');
      const second = await a.payload.encrypt('Same', 'same');

      expect(first.nonce).not.toBe(second.nonce);
      expect(first.ciphertext).not.toBe(second.ciphertext);
    });

    it('should require the master key', async () => {
      expect(await locked.payload.isAvailable()).toBe(false);
      await expect(locked.payload.encrypt('t', 'c')).rejects.toMatchObject({
        code: 'NOT_AUTHORIZED',
      });
    });

    it('should reject a tampered payload', async () => {
      const payload = await a.payload.encrypt('Shopping', 'milk');
      const bytes = base64ToBytes(payload.ciphertext);
      bytes[0] ^= 0x01;

      await expect(
        a.payload.decrypt({ ...payload, ciphertext: bytesToBase64(bytes) })
      ).rejects.toMatchObject({ code: 'AUTHENTICATION_FAILURE' });
    });
  });

  describe('prepareForUpload and processFromDownload', () => {
    const note = {
      id: 'note-1',
      title: 'Plan',
      content: JSON.stringify([{ insert: 'Step one\n' }]),
      plain_text: 'Step one',
      folder: 'inbox',
    };

    it('should strip plaintext and restore it on download', async () => {
      const uploaded = await a.payload.prepareForUpload(note);

      expect(uploaded).not.toHaveProperty('title');
      expect(uploaded).not.toHaveProperty('content');
      expect(uploaded).not.toHaveProperty('plain_text');
      expect(uploaded).toMatchObject({
        id: 'note-1',
        folder: 'inbox',
        e2ee_enabled: true,
        e2ee_version: 1,
        e2ee_ciphertext: expect.any(String),
        e2ee_nonce: expect.any(String),
        e2ee_title_ciphertext: expect.any(String),
        e2ee_title_nonce: expect.any(String),
      });
      expect(a.payload.isEncrypted(uploaded)).toBe(true);

      const downloaded = await a.payload.processFromDownload(uploaded);

      expect(downloaded).toMatchObject({
        id: 'note-1',
        title: 'Plan',
        content: note.content,
        plain_text: 'Step one',
      });
    });

    it('should upload unchanged without the master key', async () => {
      const uploaded = await locked.payload.prepareForUpload(note);

      expect(uploaded).toEqual(note);
      expect(locked.payload.isEncrypted(uploaded)).toBe(false);
    });

    it('should pass unencrypted notes through on download', async () => {
      expect(await a.payload.processFromDownload(note)).toEqual(note);
    });

    it('should show the locked placeholder on a device without the key', async () => {
      const uploaded = await a.payload.prepareForUpload(note);

      const downloaded = await locked.payload.processFromDownload(uploaded);

      expect(downloaded).toMatchObject({
        title: LOCKED_PLACEHOLDER.title,
        content: null,
        plain_text: LOCKED_PLACEHOLDER.preview,
      });
    });

    it('should show the failure placeholder for a payload under another key', async () => {
      const other = new InMemoryDocumentStore();
      const stranger = await createTestDevice(other, { name: 'Stranger' });
      await stranger.trust.registerFirstDevice();
      const foreign = await stranger.payload.prepareForUpload(note);
      await stranger.close();

      const downloaded = await a.payload.processFromDownload(foreign);

      expect(downloaded).toMatchObject({
        title: DECRYPTION_FAILED_PLACEHOLDER.title,
        content: null,
        plain_text: DECRYPTION_FAILED_PLACEHOLDER.preview,
      });
    });
  });

  describe('files', () => {
    it('should seal and open attachment bytes', async () => {
      const bytes = new Uint8Array([1, 2, 3, 4, 5]);

      const sealed = await a.payload.encryptFile(bytes);

      expect(sealed).toHaveLength(bytes.length + 40);
      expect(await a.payload.decryptFile(sealed)).toEqual(bytes);
    });

    it('should reject truncated attachments', async () => {
      const sealed = await a.payload.encryptFile(new Uint8Array([1, 2, 3]));

      await expect(a.payload.decryptFile(sealed.subarray(0, 20))).rejects.toMatchObject({
        code: 'AUTHENTICATION_FAILURE',
      });
    });

    it('should treat unrecognised bytes as sealed and short buffers as not', () => {
      expect(a.payload.looksEncrypted(new Uint8Array(64))).toBe(true);
      expect(a.payload.looksEncrypted(new Uint8Array(39))).toBe(false);
    });

    it('should not mistake a PNG for sealed data', () => {
      const png = new Uint8Array(64);
      png.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

      expect(a.payload.looksEncrypted(png)).toBe(false);
    });
  });
});
