export {
  E2eeError,
  isConnectivityFailure,
  hasE2eeCode,
  errorMessage,
  type E2eeErrorCode,
} from './e2ee-error';
