import * as os from 'node:os';
import { Injectable } from '@nestjs/common';

/** Free-form identification shown to the approving device (model, OS version...). */
export type DeviceDetails = Record<string, string | null>;

export interface DeviceInfoProvider {
  /** Human-readable name, compared case-insensitively against the primary device */
  getName(): Promise<string>;

  /** Platform identifier, e.g. `macos`, `linux`, `android` */
  getPlatform(): Promise<string>;

  getDetails(): Promise<DeviceDetails>;
}

export const DEVICE_INFO_PROVIDER = 'DEVICE_INFO_PROVIDER';

const PLATFORM_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  darwin: 'macos',
  win32: 'windows',
  linux: 'linux',
  android: 'android',
};

/**
 * Reads device identity from the host OS.
 */
@Injectable()
export class NodeDeviceInfoProvider implements DeviceInfoProvider {
  async getName(): Promise<string> {
    return os.hostname();
  }

  async getPlatform(): Promise<string> {
    return PLATFORM_NAMES[process.platform] ?? 'unknown';
  }

  async getDetails(): Promise<DeviceDetails> {
    return {
      os: os.type(),
      os_version: os.release(),
      arch: os.arch(),
      host_name: os.hostname(),
    };
  }
}
