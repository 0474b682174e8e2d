export {
  describeDevice,
  hasWrappedMasterKey,
  parseDeviceRecord,
  toApprovalRequest,
  toDeviceDocument,
} from './device-record';
export type { DeviceApprovalRequest, DeviceRecord, DeviceStatus } from './device-record';
export { DeviceTrustService } from './device-trust.service';
export type { DeviceStatusEvent } from './device-trust.service';
