import { Injectable, Logger } from '@nestjs/common';
import type { OnModuleDestroy } from '@nestjs/common';
import { concatMap, from } from 'rxjs';
import type { Subscription } from 'rxjs';
import { DeviceTrustService } from '../device-trust';
import type { DeviceRecord, DeviceStatusEvent } from '../device-trust';
import { errorMessage, isConnectivityFailure } from '../errors';
import { RecoveryKeyService } from '../recovery';
import type { RecoveryStatusCallback } from '../recovery';
import { SecureKeyStoreService } from '../secure-storage';
import type { CachedDeviceStatus } from '../secure-storage';
import { createE2eeStatusStore, isReadyStatus } from './e2ee-status.store';
import type { E2eeStatus, E2eeStatusStore } from './e2ee-status.store';

/** Statuses that are written to the local status cache. */
type SettledStatus = 'ready' | 'pendingApproval' | 'revoked' | 'needsRecovery';

const CACHED_STATUS: Record<SettledStatus, CachedDeviceStatus> = {
  ready: 'approved',
  pendingApproval: 'pending',
  revoked: 'revoked',
  needsRecovery: 'needs_recovery',
};

export type RecoverOptions = {
  /** Revoke every other device after recovering */
  setAsPrimary?: boolean;
  onStatusChange?: RecoveryStatusCallback;
};

/**
 * Decides and tracks the E2EE status of this device for the signed-in account.
 *
 * Call `initialize()` after sign-in and `dispose()` on sign-out. Status lives in a
 * zustand store (`status`) that UI code can subscribe to.
 */
@Injectable()
export class E2eeService implements OnModuleDestroy {
  private readonly logger = new Logger(E2eeService.name);

  readonly status: E2eeStatusStore = createE2eeStatusStore();

  private statusEvents: Subscription | null = null;
  private backgroundVerification: Promise<void> = Promise.resolve();

  constructor(
    private readonly deviceTrust: DeviceTrustService,
    private readonly recovery: RecoveryKeyService,
    private readonly keyStore: SecureKeyStoreService
  ) {}

  onModuleDestroy(): void {
    this.stopListening();
  }

  getStatus(): E2eeStatus {
    return this.status.getState().status;
  }

  /** `ready`, or `verifyingInBackground` with a server check still running. */
  isReady(): boolean {
    return isReadyStatus(this.getStatus());
  }

  /** Resolves when the current background verification has finished. */
  whenVerified(): Promise<void> {
    return this.backgroundVerification;
  }

  /**
   * Fast startup: enter `verifyingInBackground` when this device has keys and its last
   * known status was approved. Returns whether it did.
   */
  async preloadCachedStatus(): Promise<boolean> {
    try {
      if (!(await this.keyStore.hasDeviceKeys())) {
        return false;
      }
      if ((await this.keyStore.getCachedDeviceStatus()) !== 'approved') {
        return false;
      }
      this.enterVerifyingInBackground();
      return true;
    } catch (error) {
      this.logger.error(`Could not read cached status: ${errorMessage(error)}`);
      return false;
    }
  }

  /** Work out this device's status and start the watches it needs. Never throws. */
  async initialize(): Promise<void> {
    try {
      await this.runInitialize();
    } catch (error) {
      this.fail('Initialization failed', error);
    }
  }

  /** Create the account's master key on this device. */
  async setupE2EE(): Promise<boolean> {
    try {
      await this.deviceTrust.registerFirstDevice();
      await this.settle('ready');
      this.status.getState().setNeedsRecoveryKeySetup(true);
      this.listenForStatusChanges();
      this.logger.log('E2EE set up on first device');
      return true;
    } catch (error) {
      this.fail('Setup failed', error);
      return false;
    }
  }

  /** Re-check a pending device, e.g. when the app returns to the foreground. */
  async refreshStatus(): Promise<void> {
    if (this.getStatus() !== 'pendingApproval') {
      return;
    }

    let record: DeviceRecord | null;
    try {
      record = await this.deviceTrust.getCurrentDevice();
    } catch (error) {
      if (!isConnectivityFailure(error)) {
        throw error;
      }
      this.logger.warn('Status refresh skipped: document store unreachable');
      return;
    }
    if (record?.status !== 'approved') {
      return;
    }

    try {
      await this.deviceTrust.retrieveMasterKey();
    } catch (error) {
      this.logger.warn(`Approved but the master key is not available yet: ${errorMessage(error)}`);
      return;
    }
    await this.settle('ready');
    await this.deviceTrust.startApprovedWatches();
    this.logger.log('Device approved and ready');
  }

  /** Follow approval and revocation events. Safe to call repeatedly. */
  listenForStatusChanges(): void {
    if (this.statusEvents) {
      return;
    }

    this.statusEvents = this.deviceTrust.deviceStatus$
      .pipe(concatMap((event) => from(this.onDeviceStatusEvent(event))))
      .subscribe({
        error: (error: unknown) =>
          this.logger.error(`Status listener stopped: ${errorMessage(error)}`),
      });
  }

  /** Ask the approved devices to approve this device again after a revocation. */
  async requestReapproval(): Promise<void> {
    await this.deviceTrust.requestReapproval();
    await this.settle('pendingApproval');
    this.listenForStatusChanges();
  }

  /** From `needsRecovery`: register as pending instead of recovering. */
  async requestApproval(): Promise<void> {
    await this.deviceTrust.registerNewDevice();
    await this.settle('pendingApproval');
    this.listenForStatusChanges();
  }

  /**
   * Recover with the passphrase and become `ready`.
   *
   * @returns false for a missing recovery key or a wrong passphrase
   * @throws E2eeError UNSUPPORTED_OPERATION when this runtime cannot run the record's KDF
   */
  async recoverWithPassphrase(passphrase: string, options: RecoverOptions = {}): Promise<boolean> {
    const recovered = await this.recovery.recover(passphrase, options.onStatusChange);
    if (!recovered) {
      return false;
    }

    if (options.setAsPrimary) {
      options.onStatusChange?.('Setting as primary device...');
      try {
        await this.deviceTrust.setCurrentDeviceAsPrimary();
      } catch (error) {
        this.logger.error(`Could not make this device primary: ${errorMessage(error)}`);
      }
    }

    options.onStatusChange?.('Finalizing...');
    await this.settle('ready');
    this.listenForStatusChanges();
    return true;
  }

  /** Flag a sign-in in progress; a flag left set is cleaned up by the next `initialize`. */
  async markSignInInProgress(inProgress: boolean): Promise<void> {
    await this.keyStore.setSignInProgress(inProgress);
  }

  /** Sign-out: delete this device's record and forget every local secret. */
  async dispose(): Promise<void> {
    this.stopListening();
    this.deviceTrust.dispose();
    await this.deviceTrust.deleteCurrentDevice();
    await this.deviceTrust.clearLocalData();
    this.status.getState().reset();
    this.logger.log('E2EE disposed');
  }

  /**
   * Abandon the current master key: delete every device record and the recovery key,
   * then set up this device as the first one. Existing encrypted payloads become unreadable.
   */
  async startFresh(): Promise<void> {
    this.logger.warn('Starting fresh, all devices and the recovery key are removed');
    this.stopListening();
    this.deviceTrust.dispose();

    await this.deviceTrust.clearAllDevices();
    await this.recovery.discard();
    await this.deviceTrust.clearLocalData();

    this.status.getState().reset();
    await this.initialize();
  }

  private async runInitialize(): Promise<void> {
    const state = this.status.getState();

    if (state.status === 'verifyingInBackground') {
      await this.deviceTrust.getMasterKey();
      this.verifyInBackground();
      return;
    }

    state.setStatusMessage('Getting ready...');
    if (await this.keyStore.wasSignInInterrupted()) {
      this.logger.warn('Previous sign-in was interrupted, clearing partial state');
      await this.keyStore.setSignInProgress(false);
      await this.keyStore.clearDeviceStatus();
    }

    state.setStatusMessage('Checking your account...');
    const hasKeys = await this.keyStore.hasDeviceKeys();
    if (!hasKeys) {
      await this.setUpUnregisteredDevice();
      return;
    }

    switch (await this.keyStore.getCachedDeviceStatus()) {
      case 'approved':
        this.enterVerifyingInBackground();
        await this.deviceTrust.getMasterKey();
        this.verifyInBackground();
        return;
      case 'pending':
        state.setStatus('pendingApproval');
        break;
      case 'revoked':
        state.setStatus('revoked');
        break;
      default:
        break;
    }

    state.setStatusMessage('Verifying...');
    const record = await this.deviceTrust.getCurrentDevice();
    if (!record) {
      this.logger.warn('Device record is gone from the server, clearing local keys');
      await this.deviceTrust.clearLocalData();
      await this.setUpUnregisteredDevice();
      return;
    }

    switch (record.status) {
      case 'revoked':
        await this.settle('revoked');
        return;

      case 'pending':
        await this.settle('pendingApproval');
        await this.deviceTrust.listenForApproval();
        this.listenForStatusChanges();
        return;

      case 'approved':
        if (!(await this.deviceTrust.hasMasterKey())) {
          await this.deviceTrust.retrieveMasterKey();
        }
        await this.settle('ready');
        await this.deviceTrust.startApprovedWatches();
        this.listenForStatusChanges();
        return;
    }
  }

  /** No local keys: first device, pending registration, or recovery. */
  private async setUpUnregisteredDevice(): Promise<void> {
    const state = this.status.getState();
    state.setStatusMessage('Preparing your account...');

    if (!(await this.deviceTrust.hasAnyDevices())) {
      state.setStatus('notSetUp');
      state.setStatusMessage('Securing your account...');
      await this.setupE2EE();
      return;
    }

    if (!(await this.deviceTrust.hasApprovedDevices())) {
      this.logger.log('No approved devices, recovery or a fresh start is needed');
      await this.enterNeedsRecovery();
      return;
    }

    // Same name as the primary: most likely the primary itself after its data was cleared
    if (await this.deviceTrust.currentDeviceMatchesPrimaryName()) {
      this.logger.log('Device name matches the primary device, offering recovery');
      await this.enterNeedsRecovery();
      return;
    }

    state.setStatusMessage('Adding this device...');
    await this.deviceTrust.registerNewDevice();
    await this.settle('pendingApproval');
    this.listenForStatusChanges();
  }

  private verifyInBackground(): void {
    this.backgroundVerification = this.performBackgroundVerification();
  }

  private async performBackgroundVerification(): Promise<void> {
    try {
      const record = await this.deviceTrust.getCurrentDevice();
      if (!record) {
        this.logger.warn('Device record missing during background verification');
        await this.enterNeedsRecovery();
        return;
      }
      if (record.status === 'revoked') {
        this.logger.warn('Device was revoked, detected in background');
        await this.deviceTrust.clearMasterKey();
        await this.settle('revoked');
        return;
      }
      if (record.status !== 'approved') {
        this.logger.warn('Device is no longer approved, detected in background');
        await this.enterNeedsRecovery();
        return;
      }

      if (!(await this.deviceTrust.hasMasterKey())) {
        await this.deviceTrust.retrieveMasterKey();
      }
      await this.settle('ready');
      await this.deviceTrust.startApprovedWatches();
      this.listenForStatusChanges();
    } catch (error) {
      await this.onBackgroundVerificationError(error);
    } finally {
      this.status.getState().setVerifyingInBackground(false);
    }
  }

  /**
   * An unreachable store keeps `ready`, even without a master key (payloads then show
   * the locked placeholder). Other failures are `error` unless the master key is held.
   */
  private async onBackgroundVerificationError(error: unknown): Promise<void> {
    if (isConnectivityFailure(error)) {
      this.logger.warn('Background verification skipped: document store unreachable');
      this.status.getState().setStatus('ready');
      this.listenForStatusChanges();
      return;
    }

    this.logger.error(`Background verification failed: ${errorMessage(error)}`);
    if (await this.deviceTrust.hasMasterKey()) {
      this.status.getState().setStatus('ready');
      this.listenForStatusChanges();
      return;
    }
    this.fail('Background verification failed', error);
  }

  private async onDeviceStatusEvent(event: DeviceStatusEvent): Promise<void> {
    switch (event) {
      case 'approved':
        if (this.getStatus() !== 'ready') {
          await this.settle('ready');
        }
        return;
      case 'revoked':
        await this.settle('revoked');
        return;
      case 'unwrapFailed':
        this.status.getState().setError('Approved, but the master key could not be unwrapped');
        return;
    }
  }

  private enterVerifyingInBackground(): void {
    const state = this.status.getState();
    state.setStatus('verifyingInBackground');
    state.setVerifyingInBackground(true);
    state.setStatusMessage('Verifying encryption...');
  }

  private async enterNeedsRecovery(): Promise<void> {
    this.status.getState().setCanRecover(await this.recovery.hasRecoveryKey());
    await this.settle('needsRecovery');
  }

  private async settle(status: SettledStatus): Promise<void> {
    this.status.getState().setStatus(status);
    await this.keyStore.cacheDeviceStatus(CACHED_STATUS[status]);
  }

  private fail(context: string, error: unknown): void {
    const message = errorMessage(error);
    this.logger.error(`${context}: ${message}`);
    this.status.getState().setError(message);
  }

  private stopListening(): void {
    this.statusEvents?.unsubscribe();
    this.statusEvents = null;
  }
}
