export { E2eeService, type RecoverOptions } from './e2ee.service';
export {
  createE2eeStatusStore,
  isReadyStatus,
  type E2eeStatus,
  type E2eeStatusSnapshot,
  type E2eeStatusStore,
} from './e2ee-status.store';
