/**
 * Identity provider as seen by key custody: the signed-in account and a way out.
 */
export interface AccountSession {
  /** null when nobody is signed in */
  currentAccountId(): string | null;

  signOut(): Promise<void>;
}

export const ACCOUNT_SESSION = 'ACCOUNT_SESSION';
