/** Document paths under the account-scoped root. */
export const accountPaths = (accountId: string) => {
  const root = `users/${accountId}`;
  return {
    devices: `${root}/devices`,
    device: (deviceId: string) => `${root}/devices/${deviceId}`,
    recoveryKey: `${root}/e2ee/recovery_key`,
  };
};

export type AccountPaths = ReturnType<typeof accountPaths>;
