/**
 * @sealnote/key-custody
 *
 * Custody of the account master key across devices: device approval and revocation,
 * passphrase recovery, payload encryption and the device status state machine.
 *
 * @example
 * ```typescript
 * @Module({
 *   imports: [
 *     ConfigModule.forRoot(),
 *     E2eeModule.forRootAsync({ documentStore, accountSession, storageBackend }),
 *   ],
 * })
 * export class AppModule {}
 *
 * const e2ee = app.get(E2eeService);
 * await e2ee.initialize();
 * e2ee.status.subscribe(({ status }) => render(status));
 * ```
 */

import 'reflect-metadata';

export { E2eeModule, type E2eeCollaborators } from './e2ee.module';
export {
  DEFAULT_E2EE_OPTIONS,
  E2EE_OPTIONS,
  e2eeOptionsFromConfig,
  type E2eeOptions,
} from './e2ee-options';
export * from './errors';
export * from './store';
export * from './session';
export * from './secure-storage';
export * from './device-trust';
export * from './recovery';
export * from './payload';
export * from './orchestrator';
export * from './testing';
