import { bytesToBase64 } from '@sealnote/crypto';
import { InMemoryDocumentStore } from '../testing';
import {
  createTestDevice,
  requireDeviceId,
  requireMasterKey,
  waitForStatus,
} from '../testing/test-device';
import type { TestDevice, TestDeviceOptions } from '../testing/test-device';

describe('E2eeService', () => {
  const devicePath = (id: string) => `users/account-1/devices/${id}`;
  const passphrase = 'horse-battery-123';

  let store: InMemoryDocumentStore;
  let opened: TestDevice[];

  const open = async (
    options: TestDeviceOptions,
    documentStore: InMemoryDocumentStore = store
  ): Promise<TestDevice> => {
    const device = await createTestDevice(documentStore, options);
    opened.push(device);
    return device;
  };

  /** Close a device and start the app again on the same local storage. */
  const restart = async (device: TestDevice, name: string): Promise<TestDevice> => {
    await device.close();
    opened = opened.filter((d) => d !== device);
    return open({ name, backend: device.backend });
  };

  const readyFirstDevice = async (): Promise<TestDevice> => {
    const a = await open({ name: 'Desktop A' });
    await a.e2ee.initialize();
    return a;
  };

  /** A second device taken through initialize and approval by `approver`. */
  const approvedSecondDevice = async (approver: TestDevice): Promise<TestDevice> => {
    const b = await open({ name: 'Laptop B' });
    await b.e2ee.initialize();
    const ready = waitForStatus(b, 'ready');
    await approver.trust.approveDevice(await requireDeviceId(b));
    await ready;
    return b;
  };

  beforeEach(() => {
    store = new InMemoryDocumentStore();
    opened = [];
  });

  afterEach(async () => {
    store.setOffline(false);
    for (const device of opened) {
      await device.close();
    }
  });

  describe('initialize', () => {
    it('should set up the first device of an account', async () => {
      const a = await open({ name: 'Desktop A' });
      expect(a.e2ee.getStatus()).toBe('notInitialized');

      await a.e2ee.initialize();

      expect(a.e2ee.getStatus()).toBe('ready');
      expect(a.e2ee.isReady()).toBe(true);
      expect(a.e2ee.status.getState().needsRecoveryKeySetup).toBe(true);
      expect(await a.keyStore.getCachedDeviceStatus()).toBe('approved');
      expect(await a.trust.getMasterKey()).toHaveLength(32);
    });

    it('should register a second device as pending and become ready once approved', async () => {
      const a = await readyFirstDevice();
      const b = await open({ name: 'Laptop B' });

      await b.e2ee.initialize();

      expect(b.e2ee.getStatus()).toBe('pendingApproval');
      expect(b.e2ee.isReady()).toBe(false);
      expect(await b.keyStore.getCachedDeviceStatus()).toBe('pending');

      const ready = waitForStatus(b, 'ready');
      await a.trust.approveDevice(await requireDeviceId(b));
      await ready;

      expect(await requireMasterKey(b)).toEqual(await requireMasterKey(a));
      expect(await b.keyStore.getCachedDeviceStatus()).toBe('approved');
    });

    it('should resume waiting after a restart while pending', async () => {
      const a = await readyFirstDevice();
      const b = await open({ name: 'Laptop B' });
      await b.e2ee.initialize();
      const pendingId = await requireDeviceId(b);

      const b2 = await restart(b, 'Laptop B');
      await b2.e2ee.initialize();

      expect(b2.e2ee.getStatus()).toBe('pendingApproval');
      expect(await requireDeviceId(b2)).toBe(pendingId);

      const ready = waitForStatus(b2, 'ready');
      await a.trust.approveDevice(pendingId);
      await ready;

      expect(await requireMasterKey(b2)).toEqual(await requireMasterKey(a));
    });

    it('should offer recovery to a device named like the primary', async () => {
      const a = await readyFirstDevice();
      await a.recovery.create(passphrase);
      const again = await open({ name: 'desktop a' });

      await again.e2ee.initialize();

      expect(again.e2ee.getStatus()).toBe('needsRecovery');
      expect(again.e2ee.status.getState().canRecover).toBe(true);
      expect(await again.keyStore.getCachedDeviceStatus()).toBe('needs_recovery');
      expect(await again.keyStore.hasDeviceKeys()).toBe(false);

      await again.e2ee.requestApproval();

      expect(again.e2ee.getStatus()).toBe('pendingApproval');
      expect((await again.trust.getCurrentDevice())?.status).toBe('pending');
    });

    it('should need recovery when no device is approved', async () => {
      await store.set(devicePath('d-pending'), {
        name: 'Other',
        platform: 'linux',
        public_key: 'AAAA',
        status: 'pending',
        created_at: '2026-01-01T00:00:00.000Z',
      });
      const b = await open({ name: 'Laptop B' });

      await b.e2ee.initialize();

      expect(b.e2ee.getStatus()).toBe('needsRecovery');
      expect(b.e2ee.status.getState().canRecover).toBe(false);
    });

    it('should start over when local keys have no server record', async () => {
      const a = await readyFirstDevice();
      const oldId = await requireDeviceId(a);
      const oldKey = await requireMasterKey(a);
      await a.keyStore.clearDeviceStatus();
      await a.close();
      opened = opened.filter((d) => d !== a);
      await store.delete(devicePath(oldId));

      const a2 = await open({ name: 'Desktop A', backend: a.backend });
      await a2.e2ee.initialize();

      expect(a2.e2ee.getStatus()).toBe('ready');
      const newId = await requireDeviceId(a2);
      expect(newId).not.toBe(oldId);
      expect(await requireMasterKey(a2)).not.toEqual(oldKey);
      expect(store.paths()).toEqual([devicePath(newId)]);
    });

    it('should clean up after an interrupted sign-in', async () => {
      const a = await readyFirstDevice();

      const a2 = await restart(a, 'Desktop A');
      await a2.e2ee.markSignInInProgress(true);
      await a2.e2ee.initialize();

      // The cached status was dropped, so the server was asked before becoming ready
      expect(a2.e2ee.getStatus()).toBe('ready');
      expect(a2.e2ee.status.getState().isVerifyingInBackground).toBe(false);
      expect(await a2.keyStore.wasSignInInterrupted()).toBe(false);
      expect(await a2.keyStore.getCachedDeviceStatus()).toBe('approved');
    });

    it('should report a failure as an error status instead of throwing', async () => {
      const a = await open({ name: 'Desktop A', accountId: null });

      await a.e2ee.initialize();

      expect(a.e2ee.getStatus()).toBe('error');
      expect(a.e2ee.status.getState().errorMessage).toBe('No signed-in account');
    });
  });

  describe('cached approval', () => {
    it('should be usable at once and verify in the background', async () => {
      const a = await readyFirstDevice();
      const a2 = await restart(a, 'Desktop A');

      expect(await a2.e2ee.preloadCachedStatus()).toBe(true);
      expect(a2.e2ee.getStatus()).toBe('verifyingInBackground');
      expect(a2.e2ee.isReady()).toBe(true);

      await a2.e2ee.initialize();
      await a2.e2ee.whenVerified();

      expect(a2.e2ee.getStatus()).toBe('ready');
      expect(a2.e2ee.status.getState().isVerifyingInBackground).toBe(false);
    });

    it('should stay ready when the store is unreachable', async () => {
      const a = await readyFirstDevice();
      const a2 = await restart(a, 'Desktop A');
      store.setOffline(true);

      await a2.e2ee.initialize();
      expect(a2.e2ee.isReady()).toBe(true);
      await a2.e2ee.whenVerified();

      expect(a2.e2ee.getStatus()).toBe('ready');
      expect(await a2.payload.isAvailable()).toBe(true);
    });

    it('should stay ready offline when the master key was kept in memory only', async () => {
      const a = await readyFirstDevice();
      const uploaded = await a.payload.prepareForUpload({ id: 'note-1', title: 'Plan' });
      await a.keyStore.setRememberDevice(false);
      await a.keyStore.clearCachedMasterKey();
      const a2 = await restart(a, 'Desktop A');
      store.setOffline(true);

      await a2.e2ee.initialize();
      expect(a2.e2ee.getStatus()).toBe('verifyingInBackground');
      await a2.e2ee.whenVerified();

      expect(a2.e2ee.getStatus()).toBe('ready');
      expect(a2.e2ee.status.getState().errorMessage).toBeNull();
      expect(await a2.payload.isAvailable()).toBe(false);
      expect(await a2.payload.processFromDownload(uploaded)).toMatchObject({
        id: 'note-1',
        title: '[Encrypted Note]',
        content: null,
        plain_text: 'This note is encrypted. Please authorize this device to view it.',
      });
    });

    it('should detect a revocation that happened while closed', async () => {
      const a = await readyFirstDevice();
      const b = await approvedSecondDevice(a);
      const bId = await requireDeviceId(b);
      await b.close();
      opened = opened.filter((d) => d !== b);
      await store.update(devicePath(bId), { status: 'revoked' });

      const b2 = await open({ name: 'Laptop B', backend: b.backend });
      expect(await b2.e2ee.preloadCachedStatus()).toBe(true);
      await b2.e2ee.initialize();
      await b2.e2ee.whenVerified();

      expect(b2.e2ee.getStatus()).toBe('revoked');
      expect(await b2.trust.getMasterKey()).toBeNull();
      expect(await b2.keyStore.getCachedDeviceStatus()).toBe('revoked');
    });

    it('should fall back to recovery when the record vanished while closed', async () => {
      const a = await readyFirstDevice();
      const b = await approvedSecondDevice(a);
      const bId = await requireDeviceId(b);
      await b.close();
      opened = opened.filter((d) => d !== b);
      await store.delete(devicePath(bId));

      const b2 = await open({ name: 'Laptop B', backend: b.backend });
      await b2.e2ee.initialize();
      await b2.e2ee.whenVerified();

      expect(b2.e2ee.getStatus()).toBe('needsRecovery');
    });
  });

  describe('status changes', () => {
    it('should follow a live revocation and allow asking again', async () => {
      const a = await readyFirstDevice();
      const b = await approvedSecondDevice(a);
      const bId = await requireDeviceId(b);

      const revoked = waitForStatus(b, 'revoked');
      await a.trust.revokeDevice(bId);
      await revoked;

      expect(await b.trust.getMasterKey()).toBeNull();

      await b.e2ee.requestReapproval();

      expect(b.e2ee.getStatus()).toBe('pendingApproval');
      const newId = await requireDeviceId(b);
      expect(newId).not.toBe(bId);
      expect(store.peek(devicePath(newId))).toMatchObject({ status: 'pending' });
    });

    it('should report an approval whose wrap does not open', async () => {
      const a = await readyFirstDevice();
      const b = await open({ name: 'Laptop B' });
      await b.e2ee.initialize();

      const failed = waitForStatus(b, 'error');
      await store.update(devicePath(await requireDeviceId(b)), {
        status: 'approved',
        wrapped_umk: bytesToBase64(new Uint8Array(48)),
        wrapped_umk_nonce: bytesToBase64(new Uint8Array(24)),
        approved_by_public_key: (await a.trust.getCurrentDevice())?.publicKey ?? '',
      });
      await failed;

      expect(b.e2ee.status.getState().errorMessage).toBe(
        'Approved, but the master key could not be unwrapped'
      );
    });

    it('should pick up an approval on refresh when nothing is pushed', async () => {
      const quiet = new InMemoryDocumentStore({ pushUpdates: false });
      const a = await open({ name: 'Desktop A' }, quiet);
      await a.e2ee.initialize();
      const b = await open({ name: 'Laptop B' }, quiet);
      await b.e2ee.initialize();
      await a.trust.approveDevice(await requireDeviceId(b));

      expect(b.e2ee.getStatus()).toBe('pendingApproval');
      await b.e2ee.refreshStatus();

      expect(b.e2ee.getStatus()).toBe('ready');
      expect(await requireMasterKey(b)).toEqual(await requireMasterKey(a));
    });

    it('should stay pending when a refresh cannot reach the store', async () => {
      await readyFirstDevice();
      const b = await open({ name: 'Laptop B' });
      await b.e2ee.initialize();
      store.setOffline(true);

      await expect(b.e2ee.refreshStatus()).resolves.toBeUndefined();

      expect(b.e2ee.getStatus()).toBe('pendingApproval');
    });
  });

  describe('recoverWithPassphrase', () => {
    it('should recover and become the only trusted device', async () => {
      const a = await readyFirstDevice();
      await a.recovery.create(passphrase);
      const aId = await requireDeviceId(a);
      const c = await open({ name: 'Tablet C' });
      await c.e2ee.initialize();
      const cId = await requireDeviceId(c);
      const d = await open({ name: 'Phone D' });
      const messages: string[] = [];

      const aRevoked = waitForStatus(a, 'revoked');
      const recovered = await d.e2ee.recoverWithPassphrase(passphrase, {
        setAsPrimary: true,
        onStatusChange: (message) => messages.push(message),
      });
      await aRevoked;

      expect(recovered).toBe(true);
      expect(messages).toEqual([
        'Fetching recovery data...',
        'Decrypting recovery key...',
        'Registering device...',
        'Setting as primary device...',
        'Finalizing...',
      ]);
      expect(d.e2ee.getStatus()).toBe('ready');
      expect(await requireMasterKey(d)).toHaveLength(32);
      const aStored = store.peek(devicePath(aId));
      expect(aStored).toMatchObject({ status: 'revoked' });
      expect(aStored).not.toHaveProperty('wrapped_umk');
      expect(store.peek(devicePath(cId))).toBeNull();
      expect(await a.trust.getMasterKey()).toBeNull();
    });

    it('should leave the status alone for a wrong passphrase', async () => {
      const a = await readyFirstDevice();
      await a.recovery.create(passphrase);
      const again = await open({ name: 'Desktop A' });
      await again.e2ee.initialize();

      expect(await again.e2ee.recoverWithPassphrase('wrong')).toBe(false);

      expect(again.e2ee.getStatus()).toBe('needsRecovery');
    });
  });

  describe('dispose and startFresh', () => {
    it('should delete the device record and every local secret on sign-out', async () => {
      const a = await readyFirstDevice();
      const aId = await requireDeviceId(a);

      await a.e2ee.dispose();

      expect(store.peek(devicePath(aId))).toBeNull();
      expect(await a.keyStore.hasDeviceKeys()).toBe(false);
      expect(await a.trust.getMasterKey()).toBeNull();
      expect(a.e2ee.getStatus()).toBe('notInitialized');
    });

    it('should replace the master key and drop every device and the recovery key', async () => {
      const a = await readyFirstDevice();
      await a.recovery.create(passphrase);
      const oldKey = await requireMasterKey(a);
      const b = await open({ name: 'Laptop B' });
      await b.e2ee.initialize();

      const bRevoked = waitForStatus(b, 'revoked');
      await a.e2ee.startFresh();
      await bRevoked;

      expect(a.e2ee.getStatus()).toBe('ready');
      expect(a.e2ee.status.getState().needsRecoveryKeySetup).toBe(true);
      expect(await requireMasterKey(a)).not.toEqual(oldKey);
      expect(await a.recovery.hasRecoveryKey()).toBe(false);
      expect(store.paths()).toEqual([devicePath(await requireDeviceId(a))]);
      expect(await b.keyStore.hasDeviceKeys()).toBe(false);
    });
  });
});
