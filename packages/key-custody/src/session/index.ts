export { ACCOUNT_SESSION, type AccountSession } from './account-session.interface';
export {
  DEVICE_INFO_PROVIDER,
  NodeDeviceInfoProvider,
  type DeviceInfoProvider,
  type DeviceDetails,
} from './device-info.provider';
