import { Inject, Injectable, Logger } from '@nestjs/common';
import type { OnModuleDestroy } from '@nestjs/common';
import {
  BehaviorSubject,
  EMPTY,
  Observable,
  Subject,
  Subscription,
  catchError,
  concatMap,
  exhaustMap,
  from,
  map,
  merge,
  of,
  takeWhile,
  timer,
} from 'rxjs';
import {
  MASTER_KEY_SIZE,
  base64ToBytes,
  bytesToBase64,
  clearBytes,
  computeSharedSecret,
  decryptAead,
  encryptAead,
  generateMasterKey,
  generateRandomId,
  generateX25519Keypair,
} from '@sealnote/crypto';
import type { AeadCiphertext, X25519Keypair } from '@sealnote/crypto';
import { E2eeError, errorMessage, isConnectivityFailure } from '../errors';
import { E2EE_OPTIONS } from '../e2ee-options';
import type { E2eeOptions } from '../e2ee-options';
import { ACCOUNT_SESSION, DEVICE_INFO_PROVIDER } from '../session';
import type { AccountSession, DeviceDetails, DeviceInfoProvider } from '../session';
import { SecureKeyStoreService } from '../secure-storage';
import { DOCUMENT_STORE, FIELD_DELETE, accountPaths } from '../store';
import type { AccountPaths, BatchOperation, DocumentSnapshot, DocumentStore } from '../store';
import {
  hasWrappedMasterKey,
  parseDeviceRecord,
  toApprovalRequest,
  toDeviceDocument,
} from './device-record';
import type { DeviceApprovalRequest, DeviceRecord } from './device-record';

/** Trust changes pushed to the orchestrator. */
export type DeviceStatusEvent = 'approved' | 'revoked' | 'unwrapFailed';

type WatchName = 'approval' | 'status' | 'pending';

type ApprovalOutcome = 'pending' | 'settled';

const PENDING_FILTER = { field: 'status', equals: 'pending' };

/** Fields cleared when a record goes back to pending. */
const pendingResetFields = () => ({
  status: 'pending',
  wrapped_umk: FIELD_DELETE,
  wrapped_umk_nonce: FIELD_DELETE,
  approved_at: FIELD_DELETE,
  approved_by_public_key: FIELD_DELETE,
  revoked_at: FIELD_DELETE,
});

const isRecord = (record: DeviceRecord | null): record is DeviceRecord => record !== null;

/** Time a device gained authority: approval, or creation for self-wrapped devices. */
const authorityTime = (device: DeviceRecord): number =>
  (device.approvedAt ?? device.createdAt).getTime();

/**
 * Device registration, approval and revocation, and the master key wraps that go with them.
 *
 * The master key is wrapped per device under the raw X25519 shared secret between the
 * approver's private key and the device's public key. The first device wraps it for
 * itself (own private key with own public key).
 */
@Injectable()
export class DeviceTrustService implements OnModuleDestroy {
  private readonly logger = new Logger(DeviceTrustService.name);

  private masterKey: Uint8Array | null = null;
  private readonly subscriptions = new Map<WatchName, Subscription>();
  private readonly statusEvents = new Subject<DeviceStatusEvent>();
  private readonly pendingApprovals = new BehaviorSubject<DeviceApprovalRequest[]>([]);

  /** Approval, revocation and unwrap failures of the current device. */
  readonly deviceStatus$: Observable<DeviceStatusEvent> = this.statusEvents.asObservable();

  /** Live list of other devices waiting for approval, newest first. */
  readonly pendingApprovals$: Observable<DeviceApprovalRequest[]> =
    this.pendingApprovals.asObservable();

  constructor(
    @Inject(DOCUMENT_STORE)
    private readonly store: DocumentStore,
    @Inject(ACCOUNT_SESSION)
    private readonly session: AccountSession,
    @Inject(DEVICE_INFO_PROVIDER)
    private readonly deviceInfo: DeviceInfoProvider,
    @Inject(E2EE_OPTIONS)
    private readonly options: E2eeOptions,
    private readonly keyStore: SecureKeyStoreService
  ) {}

  onModuleDestroy(): void {
    this.dispose();
  }

  // ---------------------------------------------------------------------------
  // Master key cache
  // ---------------------------------------------------------------------------

  /** In-memory key, falling back to the secure store copy. */
  async getMasterKey(): Promise<Uint8Array | null> {
    if (this.masterKey) {
      return this.masterKey;
    }
    const cached = await this.keyStore.getCachedMasterKey();
    if (cached && cached.length === MASTER_KEY_SIZE) {
      this.masterKey = cached;
    }
    return this.masterKey;
  }

  async hasMasterKey(): Promise<boolean> {
    return (await this.getMasterKey()) !== null;
  }

  /** Keeps a copy; persisted only when the device is remembered. */
  async setMasterKey(masterKey: Uint8Array): Promise<void> {
    clearBytes(this.masterKey);
    this.masterKey = new Uint8Array(masterKey);
    if (await this.keyStore.getRememberDevice()) {
      await this.keyStore.cacheMasterKey(this.masterKey);
    }
  }

  async clearMasterKey(): Promise<void> {
    clearBytes(this.masterKey);
    this.masterKey = null;
    await this.keyStore.clearCachedMasterKey();
  }

  /** Forget every local secret of this device. */
  async clearLocalData(): Promise<void> {
    clearBytes(this.masterKey);
    this.masterKey = null;
    await this.keyStore.clearAll();
  }

  async getCurrentDeviceId(): Promise<string | null> {
    return this.keyStore.getDeviceId();
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /**
   * Set up the first device of an account: new keypair, new master key, self-wrap.
   *
   * The approved record is written before any secret is kept locally, so a failed
   * write leaves no local key material without a server record.
   */
  async registerFirstDevice(): Promise<DeviceRecord> {
    const masterKey = generateMasterKey();
    try {
      const record = await this.registerSelfWrappedDevice(masterKey, false);
      this.logger.log(`Registered first device ${record.id}`);
      return record;
    } finally {
      clearBytes(masterKey);
    }
  }

  /**
   * Register this device as pending and wait for an approved device to wrap the key.
   *
   * Resumes an existing pending registration, or reuses a pending record with the same
   * name and platform left by an interrupted attempt (rotating in a new public key).
   */
  async registerNewDevice(): Promise<DeviceRecord> {
    const paths = this.paths();

    const storedId = await this.keyStore.getDeviceId();
    if (storedId && (await this.keyStore.hasDeviceKeys())) {
      const existing = parseDeviceRecord(await this.store.get(paths.device(storedId)));
      if (existing?.status === 'pending') {
        this.logger.log(`Device ${storedId} is already pending, resuming approval wait`);
        await this.listenForApproval();
        return existing;
      }
    }

    const info = await this.readDeviceInfo();
    const keypair = generateX25519Keypair();
    const publicKey = bytesToBase64(keypair.publicKey);
    const now = new Date();

    const sameName = await this.store.query(paths.devices, [{ field: 'name', equals: info.name }]);
    const reusable = sameName
      .map((snapshot) => parseDeviceRecord(snapshot))
      .find(
        (record): record is DeviceRecord =>
          record !== null && record.status === 'pending' && record.platform === info.platform
      );

    let record: DeviceRecord;
    if (reusable) {
      await this.store.update(paths.device(reusable.id), {
        public_key: publicKey,
        created_at: now.toISOString(),
        device_details: info.details,
      });
      record = { ...reusable, publicKey, createdAt: now, deviceDetails: info.details };
      this.logger.log(`Reusing pending registration ${record.id}`);
    } else {
      record = {
        id: generateRandomId(),
        name: info.name,
        platform: info.platform,
        publicKey,
        status: 'pending',
        createdAt: now,
        deviceDetails: info.details,
      };
      await this.store.set(paths.device(record.id), toDeviceDocument(record));
      this.logger.log(`Registered pending device ${record.id}`);
    }

    await this.keyStore.saveDeviceIdentity(record.id, keypair);
    await this.keyStore.cacheDeviceStatus('pending');
    await this.listenForApproval();
    return record;
  }

  /**
   * Register this device as approved with a master key recovered by passphrase.
   *
   * Any previous identity of this device is dropped first: its watches are cancelled,
   * its record is deleted (best effort) and its local secrets are cleared. The new
   * record is self-wrapped and marked `recovered`.
   */
  async registerRecoveredDevice(masterKey: Uint8Array): Promise<DeviceRecord> {
    const paths = this.paths();
    this.dispose();

    const staleId = await this.keyStore.getDeviceId();
    if (staleId) {
      try {
        await this.store.delete(paths.device(staleId));
      } catch (error) {
        this.logger.warn(`Could not delete stale device record ${staleId}: ${errorMessage(error)}`);
      }
    }
    await this.clearLocalData();

    const record = await this.registerSelfWrappedDevice(masterKey, true);
    this.logger.log(`Registered recovered device ${record.id}`);
    return record;
  }

  /**
   * Ask to be approved again after a revocation.
   *
   * Always drops the cached master key. Without local keys, or when the server record
   * is gone, this registers from scratch; otherwise the record is reset to pending.
   */
  async requestReapproval(): Promise<DeviceRecord> {
    await this.clearMasterKey();

    const deviceId = await this.keyStore.getDeviceId();
    if (!deviceId || !(await this.keyStore.hasDeviceKeys())) {
      return this.registerNewDevice();
    }

    const path = this.paths().device(deviceId);
    const existing = parseDeviceRecord(await this.store.get(path));
    if (!existing) {
      this.logger.warn(`Device ${deviceId} no longer exists, registering again`);
      await this.clearLocalData();
      return this.registerNewDevice();
    }

    const requestedAt = new Date();
    await this.store.update(path, { ...pendingResetFields(), created_at: requestedAt.toISOString() });
    await this.keyStore.cacheDeviceStatus('pending');
    this.untrack('status');
    await this.listenForApproval();

    this.logger.log(`Device ${deviceId} requested re-approval`);
    return {
      id: existing.id,
      name: existing.name,
      platform: existing.platform,
      publicKey: existing.publicKey,
      status: 'pending',
      createdAt: requestedAt,
      deviceDetails: existing.deviceDetails,
    };
  }

  // ---------------------------------------------------------------------------
  // Approval, revocation
  // ---------------------------------------------------------------------------

  /**
   * Wrap the master key for a pending device.
   *
   * @throws E2eeError NOT_AUTHORIZED without the master key, INVALID_STATE for self or a
   *   non-pending target, NOT_FOUND for an unknown id
   */
  async approveDevice(pendingDeviceId: string): Promise<void> {
    const masterKey = await this.getMasterKey();
    if (!masterKey) {
      throw E2eeError.notAuthorized('This device does not hold the master key');
    }

    const ownId = await this.keyStore.getDeviceId();
    if (pendingDeviceId === ownId) {
      throw E2eeError.invalidState('A device cannot approve itself');
    }

    const keypair = await this.requireKeypair();
    const path = this.paths().device(pendingDeviceId);
    const target = parseDeviceRecord(await this.store.get(path));
    if (!target) {
      throw E2eeError.notFound(`Device ${pendingDeviceId} not found`);
    }
    if (target.status !== 'pending') {
      throw E2eeError.invalidState(`Device ${pendingDeviceId} is ${target.status}, not pending`);
    }

    const wrapped = this.wrapMasterKey(
      masterKey,
      keypair.privateKey,
      this.decodeField(target.publicKey, 'public_key')
    );

    // Last writer wins if two devices approve at once; both wraps hold the same key
    await this.store.update(path, {
      wrapped_umk: bytesToBase64(wrapped.ciphertext),
      wrapped_umk_nonce: bytesToBase64(wrapped.nonce),
      status: 'approved',
      approved_at: new Date().toISOString(),
      approved_by_public_key: bytesToBase64(keypair.publicKey),
    });

    this.logger.log(`Approved device ${pendingDeviceId}`);
    await this.refreshPendingApprovals();
  }

  /** Reject a pending request by deleting it. */
  async denyDevice(pendingDeviceId: string): Promise<void> {
    const target = await this.getDevice(pendingDeviceId);
    if (!target) {
      throw E2eeError.notFound(`Device ${pendingDeviceId} not found`);
    }
    if (target.status !== 'pending') {
      throw E2eeError.invalidState(`Device ${pendingDeviceId} is ${target.status}, not pending`);
    }
    await this.revokeDevice(pendingDeviceId);
  }

  /**
   * Hard revoke: delete another device's record.
   *
   * @throws E2eeError INVALID_STATE for the current device, NOT_AUTHORIZED without the master key
   */
  async revokeDevice(deviceId: string): Promise<void> {
    const ownId = await this.keyStore.getDeviceId();
    if (deviceId === ownId) {
      throw E2eeError.invalidState('A device cannot revoke itself');
    }
    if (!(await this.hasMasterKey())) {
      throw E2eeError.notAuthorized('Only an approved device can revoke devices');
    }

    await this.store.delete(this.paths().device(deviceId));
    this.logger.log(`Revoked device ${deviceId}`);
    await this.refreshPendingApprovals();
  }

  /** Put another device back to pending, clearing its wrap. */
  async resetDeviceToPending(deviceId: string): Promise<void> {
    const ownId = await this.keyStore.getDeviceId();
    if (deviceId === ownId) {
      throw E2eeError.invalidState('Use requestReapproval for the current device');
    }

    await this.store.update(this.paths().device(deviceId), pendingResetFields());
    this.logger.log(`Reset device ${deviceId} to pending`);
  }

  /**
   * Revoke every other approved device and delete every other pending one, in one batch.
   * Used after passphrase recovery to make this device the only trust anchor.
   */
  async setCurrentDeviceAsPrimary(): Promise<void> {
    const ownId = await this.requireDeviceId();
    const paths = this.paths();
    const revokedAt = new Date().toISOString();

    const operations = (await this.getDevices())
      .filter((device) => device.id !== ownId)
      .flatMap((device): BatchOperation[] => {
        switch (device.status) {
          case 'approved':
            return [
              {
                type: 'update',
                path: paths.device(device.id),
                data: {
                  status: 'revoked',
                  revoked_at: revokedAt,
                  wrapped_umk: FIELD_DELETE,
                  wrapped_umk_nonce: FIELD_DELETE,
                },
              },
            ];
          case 'pending':
            return [{ type: 'delete', path: paths.device(device.id) }];
          case 'revoked':
            return [];
        }
      });

    if (operations.length > 0) {
      await this.store.batch(operations);
    }
    this.logger.log(`Device ${ownId} is now the only trusted device`);
  }

  // ---------------------------------------------------------------------------
  // Unwrap
  // ---------------------------------------------------------------------------

  /**
   * Recover the master key from an approved record and cache it.
   *
   * Cross-device wraps use the approver's public key; self-wraps use our own.
   *
   * @throws E2eeError AUTHENTICATION_FAILURE when the wrap does not open with our key
   */
  async unwrapMasterKey(record: DeviceRecord): Promise<Uint8Array> {
    if (record.status !== 'approved' || !record.wrappedUmk || !record.wrappedUmkNonce) {
      throw E2eeError.invalidState(`Device ${record.id} has no wrapped master key`);
    }

    const keypair = await this.requireKeypair();
    const peerPublicKey = record.approvedByPublicKey
      ? this.decodeField(record.approvedByPublicKey, 'approved_by_public_key')
      : keypair.publicKey;
    const ciphertext = this.decodeField(record.wrappedUmk, 'wrapped_umk');
    const nonce = this.decodeField(record.wrappedUmkNonce, 'wrapped_umk_nonce');

    const unwrapKey = this.agree(keypair.privateKey, peerPublicKey);
    let masterKey: Uint8Array;
    try {
      masterKey = decryptAead(ciphertext, nonce, unwrapKey);
    } catch (error) {
      throw E2eeError.fromCrypto(error);
    } finally {
      clearBytes(unwrapKey);
    }

    if (masterKey.length !== MASTER_KEY_SIZE) {
      throw E2eeError.invalidState('Unwrapped master key has the wrong size');
    }

    await this.setMasterKey(masterKey);
    return masterKey;
  }

  /**
   * Fetch the current device record and unwrap from it.
   *
   * @throws E2eeError NOT_FOUND when the record is gone, NOT_AUTHORIZED when not approved
   */
  async retrieveMasterKey(): Promise<Uint8Array> {
    const record = await this.getCurrentDevice();
    if (!record) {
      throw E2eeError.notFound('Current device is not registered');
    }
    if (record.status !== 'approved') {
      throw E2eeError.notAuthorized(`Current device is ${record.status}`);
    }
    return this.unwrapMasterKey(record);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** All devices: current first, others newest first. */
  async getDevices(): Promise<DeviceRecord[]> {
    const ownId = await this.keyStore.getDeviceId();
    const snapshots = await this.store.query(this.paths().devices);

    return snapshots
      .map((snapshot) => parseDeviceRecord(snapshot))
      .filter(isRecord)
      .sort((a, b) => {
        if (a.id === ownId) return -1;
        if (b.id === ownId) return 1;
        return b.createdAt.getTime() - a.createdAt.getTime();
      });
  }

  async getApprovedDevices(): Promise<DeviceRecord[]> {
    return (await this.getDevices()).filter((device) => device.status === 'approved');
  }

  async getPendingDevices(): Promise<DeviceRecord[]> {
    return (await this.getDevices()).filter((device) => device.status === 'pending');
  }

  async getDevice(deviceId: string): Promise<DeviceRecord | null> {
    return parseDeviceRecord(await this.store.get(this.paths().device(deviceId)));
  }

  /** Server record of this device; null when unregistered or deleted. */
  async getCurrentDevice(): Promise<DeviceRecord | null> {
    const deviceId = await this.keyStore.getDeviceId();
    return deviceId ? this.getDevice(deviceId) : null;
  }

  async hasAnyDevices(): Promise<boolean> {
    return (await this.store.query(this.paths().devices)).length > 0;
  }

  async hasApprovedDevices(): Promise<boolean> {
    const approved = await this.store.query(this.paths().devices, [
      { field: 'status', equals: 'approved' },
    ]);
    return approved.length > 0;
  }

  /** Earliest-created approved device. */
  async getPrimaryDevice(): Promise<DeviceRecord | null> {
    const approved = await this.getApprovedDevices();
    const sorted = approved.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    return sorted[0] ?? null;
  }

  /**
   * Whether this device is the master: the approved device with the earliest
   * approval time. True when no device is approved yet.
   *
   * This is policy for the UI; any device holding the master key can wrap it.
   */
  async isMasterDevice(): Promise<boolean> {
    const approved = await this.getApprovedDevices();
    if (approved.length === 0) {
      return true;
    }

    const master = approved.reduce((earliest, device) =>
      authorityTime(device) < authorityTime(earliest) ? device : earliest
    );
    return master.id === (await this.keyStore.getDeviceId());
  }

  /** Case-insensitive match of this device's name against the primary device. */
  async currentDeviceMatchesPrimaryName(): Promise<boolean> {
    const primary = await this.getPrimaryDevice();
    if (!primary) {
      return false;
    }
    const name = await this.deviceInfo.getName();
    return primary.name.toLowerCase() === name.toLowerCase();
  }

  /** Server check that this device is approved. Unreachable store counts as yes. */
  async checkCurrentDeviceAuthorization(): Promise<boolean> {
    try {
      const record = await this.getCurrentDevice();
      return record?.status === 'approved';
    } catch (error) {
      if (isConnectivityFailure(error)) {
        this.logger.warn('Authorization check skipped: document store unreachable');
        return true;
      }
      throw error;
    }
  }

  /** One-shot refresh of the pending list. */
  async refreshPendingApprovals(): Promise<DeviceApprovalRequest[]> {
    const ownId = await this.keyStore.getDeviceId();
    const requests = this.toApprovalRequests(
      await this.store.query(this.paths().devices, [PENDING_FILTER]),
      ownId
    );
    this.pendingApprovals.next(requests);
    return requests;
  }

  /**
   * Pending requests the first time they appear, while this device is the master.
   * Drives approval alerts.
   */
  newApprovalRequests(): Observable<DeviceApprovalRequest> {
    let lastKnown = new Set<string>();

    return this.pendingApprovals$.pipe(
      concatMap((requests) =>
        from(this.isMasterDevice()).pipe(
          catchError((error: unknown) => {
            this.logger.warn(`Master check failed: ${errorMessage(error)}`);
            return of(false);
          }),
          map((isMaster) => {
            if (!isMaster) {
              return [];
            }
            const fresh = requests.filter((request) => !lastKnown.has(request.deviceId));
            lastKnown = new Set(requests.map((request) => request.deviceId));
            return fresh;
          })
        )
      ),
      concatMap((fresh) => from(fresh))
    );
  }

  // ---------------------------------------------------------------------------
  // Housekeeping
  // ---------------------------------------------------------------------------

  /** Delete every device record of the account (fresh start). */
  async clearAllDevices(): Promise<void> {
    await this.store.deleteCollection(this.paths().devices);
    this.logger.log('Cleared all device records');
  }

  /** Delete this device's record on logout. Failures are logged only. */
  async deleteCurrentDevice(): Promise<void> {
    try {
      const deviceId = await this.keyStore.getDeviceId();
      if (deviceId) {
        await this.store.delete(this.paths().device(deviceId));
        this.logger.log(`Deleted device ${deviceId}`);
      }
    } catch (error) {
      this.logger.warn(`Could not delete current device record: ${errorMessage(error)}`);
    }
  }

  /**
   * Delete pending requests older than the configured TTL, and pending records
   * without a readable `created_at`.
   *
   * @returns number of records deleted
   */
  async purgeExpiredPendingDevices(now: Date = new Date()): Promise<number> {
    const threshold = now.getTime() - this.options.pendingDeviceTtlMs;
    const pending = await this.store.query(this.paths().devices, [PENDING_FILTER]);

    const expired = pending.filter((snapshot) => {
      const createdAt = snapshot.data?.created_at;
      const time = typeof createdAt === 'string' ? Date.parse(createdAt) : Number.NaN;
      return Number.isNaN(time) || time < threshold;
    });

    if (expired.length > 0) {
      await this.store.batch(
        expired.map((snapshot): BatchOperation => ({ type: 'delete', path: snapshot.path }))
      );
      this.logger.log(`Purged ${expired.length} expired pending device(s)`);
    }
    return expired.length;
  }

  // ---------------------------------------------------------------------------
  // Watches
  // ---------------------------------------------------------------------------

  /**
   * Follow this device's pending record until it is approved, denied or revoked.
   * Push updates are backed by a low-frequency poll.
   */
  async listenForApproval(): Promise<void> {
    const deviceId = await this.requireDeviceId();
    const path = this.paths().device(deviceId);
    const period = this.options.approvalPollIntervalMs;

    const pushed$ = this.store.watchDocument(path).pipe(
      catchError((error: unknown) => {
        this.logger.warn(`Approval watch failed, relying on polling: ${errorMessage(error)}`);
        return EMPTY;
      })
    );

    const polled$ = timer(period, period).pipe(
      exhaustMap(() =>
        from(this.store.get(path)).pipe(
          catchError((error: unknown) => {
            this.logger.warn(`Approval poll failed: ${errorMessage(error)}`);
            return EMPTY;
          })
        )
      )
    );

    const subscription = merge(pushed$, polled$)
      .pipe(
        concatMap((snapshot) => from(this.handleApprovalSnapshot(snapshot))),
        takeWhile((outcome) => outcome === 'pending')
      )
      .subscribe({
        error: (error: unknown) =>
          this.logger.error(`Approval watch stopped: ${errorMessage(error)}`),
      });

    this.track('approval', subscription);
  }

  /** Watch this device's record for revocation or deletion. */
  async listenForDeviceStatusChanges(): Promise<void> {
    const deviceId = await this.keyStore.getDeviceId();
    if (!deviceId) {
      return;
    }

    const subscription = this.store
      .watchDocument(this.paths().device(deviceId))
      .pipe(concatMap((snapshot) => from(this.handleStatusSnapshot(snapshot))))
      .subscribe({
        error: (error: unknown) =>
          this.logger.warn(`Device status watch stopped: ${errorMessage(error)}`),
      });

    this.track('status', subscription);
  }

  /** Keep pendingApprovals$ in sync with the store. */
  async listenForPendingApprovals(): Promise<void> {
    const ownId = await this.keyStore.getDeviceId();

    const subscription = this.store
      .watchQuery(this.paths().devices, [PENDING_FILTER])
      .pipe(map((snapshots) => this.toApprovalRequests(snapshots, ownId)))
      .subscribe({
        next: (requests) => this.pendingApprovals.next(requests),
        error: (error: unknown) =>
          this.logger.warn(`Pending approvals watch stopped: ${errorMessage(error)}`),
      });

    this.track('pending', subscription);
  }

  /** Start the watches an approved device runs. */
  async startApprovedWatches(): Promise<void> {
    await this.listenForDeviceStatusChanges();
    await this.listenForPendingApprovals();
  }

  /** Cancel every watch. Safe to call repeatedly. */
  dispose(): void {
    for (const subscription of this.subscriptions.values()) {
      subscription.unsubscribe();
    }
    this.subscriptions.clear();
    this.pendingApprovals.next([]);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /** Write an approved record wrapping `masterKey` for a fresh keypair, then keep it locally. */
  private async registerSelfWrappedDevice(
    masterKey: Uint8Array,
    recovered: boolean
  ): Promise<DeviceRecord> {
    const paths = this.paths();
    const info = await this.readDeviceInfo();
    const keypair = generateX25519Keypair();
    const wrapped = this.wrapMasterKey(masterKey, keypair.privateKey, keypair.publicKey);
    const now = new Date();

    const record: DeviceRecord = {
      id: generateRandomId(),
      name: info.name,
      platform: info.platform,
      publicKey: bytesToBase64(keypair.publicKey),
      wrappedUmk: bytesToBase64(wrapped.ciphertext),
      wrappedUmkNonce: bytesToBase64(wrapped.nonce),
      status: 'approved',
      createdAt: now,
      approvedAt: now,
      deviceDetails: info.details,
      ...(recovered && { recovered: true }),
    };

    await this.store.set(paths.device(record.id), toDeviceDocument(record));

    await this.keyStore.saveDeviceIdentity(record.id, keypair);
    await this.setMasterKey(masterKey);
    await this.keyStore.cacheDeviceStatus('approved');
    await this.startApprovedWatches();
    return record;
  }

  private async handleApprovalSnapshot(snapshot: DocumentSnapshot): Promise<ApprovalOutcome> {
    const record = parseDeviceRecord(snapshot);

    if (!record) {
      // A deleted pending record is a denial
      this.logger.warn(`Pending device ${snapshot.id} was removed`);
      await this.clearLocalData();
      this.statusEvents.next('revoked');
      return 'settled';
    }

    switch (record.status) {
      case 'pending':
        return 'pending';

      case 'revoked':
        await this.clearMasterKey();
        await this.keyStore.cacheDeviceStatus('revoked');
        this.statusEvents.next('revoked');
        return 'settled';

      case 'approved':
        if (!hasWrappedMasterKey(record)) {
          return 'pending';
        }
        try {
          await this.unwrapMasterKey(record);
        } catch (error) {
          this.logger.error(`Approved, but the master key did not unwrap: ${errorMessage(error)}`);
          this.statusEvents.next('unwrapFailed');
          return 'settled';
        }
        await this.keyStore.cacheDeviceStatus('approved');
        this.logger.log(`Device ${record.id} approved`);
        this.statusEvents.next('approved');
        await this.startApprovedWatches();
        return 'settled';
    }
  }

  private async handleStatusSnapshot(snapshot: DocumentSnapshot): Promise<void> {
    const record = parseDeviceRecord(snapshot);
    if (record && record.status !== 'revoked') {
      return;
    }

    this.logger.warn(`Device ${snapshot.id} was ${record ? 'revoked' : 'removed'}`);
    this.untrack('status');
    await this.clearMasterKey();
    await this.keyStore.cacheDeviceStatus('revoked');
    this.statusEvents.next('revoked');
  }

  private toApprovalRequests(
    snapshots: DocumentSnapshot[],
    ownId: string | null
  ): DeviceApprovalRequest[] {
    return snapshots
      .map((snapshot) => parseDeviceRecord(snapshot))
      .filter(isRecord)
      .filter((record) => record.status === 'pending' && record.id !== ownId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(toApprovalRequest);
  }

  private track(name: WatchName, subscription: Subscription): void {
    this.subscriptions.get(name)?.unsubscribe();
    this.subscriptions.set(name, subscription);
  }

  private untrack(name: WatchName): void {
    this.subscriptions.get(name)?.unsubscribe();
    this.subscriptions.delete(name);
  }

  private wrapMasterKey(
    masterKey: Uint8Array,
    privateKey: Uint8Array,
    peerPublicKey: Uint8Array
  ): AeadCiphertext {
    const wrapKey = this.agree(privateKey, peerPublicKey);
    try {
      return encryptAead(masterKey, wrapKey);
    } finally {
      clearBytes(wrapKey);
    }
  }

  private agree(privateKey: Uint8Array, publicKey: Uint8Array): Uint8Array {
    try {
      return computeSharedSecret(privateKey, publicKey);
    } catch (error) {
      throw E2eeError.fromCrypto(error);
    }
  }

  private decodeField(value: string, field: string): Uint8Array {
    try {
      return base64ToBytes(value);
    } catch {
      throw E2eeError.invalidState(`Device record field ${field} is not valid base64`);
    }
  }

  private paths(): AccountPaths {
    const accountId = this.session.currentAccountId();
    if (!accountId) {
      throw E2eeError.invalidState('No signed-in account');
    }
    return accountPaths(accountId);
  }

  private async requireDeviceId(): Promise<string> {
    const deviceId = await this.keyStore.getDeviceId();
    if (!deviceId) {
      throw E2eeError.invalidState('This device is not registered');
    }
    return deviceId;
  }

  private async requireKeypair(): Promise<X25519Keypair> {
    const keypair = await this.keyStore.getDeviceKeypair();
    if (!keypair) {
      throw E2eeError.notAuthorized('Device keys are missing');
    }
    return keypair;
  }

  private async readDeviceInfo(): Promise<{
    name: string;
    platform: string;
    details: DeviceDetails;
  }> {
    const [name, platform, details] = await Promise.all([
      this.deviceInfo.getName(),
      this.deviceInfo.getPlatform(),
      this.deviceInfo.getDetails(),
    ]);
    return { name, platform, details };
  }
}
