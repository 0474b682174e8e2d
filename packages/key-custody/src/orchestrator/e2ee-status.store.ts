import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';

export type E2eeStatus =
  | 'notInitialized'
  | 'notSetUp'
  | 'pendingApproval'
  | 'revoked'
  | 'needsRecovery'
  | 'ready'
  | 'verifyingInBackground'
  | 'error';

type E2eeStatusState = {
  status: E2eeStatus;
  /** Progress text while initializing */
  statusMessage: string;
  /** Set with `error` status */
  errorMessage: string | null;
  /** Raised after first-device setup until a recovery key exists */
  needsRecoveryKeySetup: boolean;
  /** With `needsRecovery`: whether a recovery key exists for the account */
  canRecover: boolean;
  isVerifyingInBackground: boolean;

  // Actions
  setStatus: (status: E2eeStatus) => void;
  setError: (message: string) => void;
  setStatusMessage: (message: string) => void;
  setNeedsRecoveryKeySetup: (needed: boolean) => void;
  setCanRecover: (canRecover: boolean) => void;
  setVerifyingInBackground: (verifying: boolean) => void;
  reset: () => void;
};

export type E2eeStatusStore = StoreApi<E2eeStatusState>;
export type E2eeStatusSnapshot = E2eeStatusState;

const initialState = {
  status: 'notInitialized',
  statusMessage: '',
  errorMessage: null,
  needsRecoveryKeySetup: false,
  canRecover: false,
  isVerifyingInBackground: false,
} satisfies Partial<E2eeStatusState>;

/**
 * Observable E2EE status of this device, one store per orchestrator.
 *
 * `ready` and `verifyingInBackground` both allow encryption: the second only means a
 * server check is still running.
 */
export function createE2eeStatusStore(): E2eeStatusStore {
  return createStore<E2eeStatusState>((set) => ({
    ...initialState,

    setStatus: (status) =>
      set({ status, ...(status !== 'error' && { errorMessage: null }) }),

    setError: (message) => set({ status: 'error', errorMessage: message }),

    setStatusMessage: (message) => set({ statusMessage: message }),

    setNeedsRecoveryKeySetup: (needed) => set({ needsRecoveryKeySetup: needed }),

    setCanRecover: (canRecover) => set({ canRecover }),

    setVerifyingInBackground: (verifying) => set({ isVerifyingInBackground: verifying }),

    reset: () => set({ ...initialState }),
  }));
}

/** Whether payloads can be encrypted and decrypted in this status. */
export function isReadyStatus(status: E2eeStatus): boolean {
  return status === 'ready' || status === 'verifyingInBackground';
}
