import type { DocumentData, DocumentSnapshot } from '../store';
import type { DeviceDetails } from '../session';

export type DeviceStatus = 'pending' | 'approved' | 'revoked';

const DEVICE_STATUSES: readonly DeviceStatus[] = ['pending', 'approved', 'revoked'];

/**
 * One registered device.
 *
 * `wrappedUmk` and `wrappedUmkNonce` are present exactly when status is approved.
 * Byte fields are base64.
 */
export type DeviceRecord = {
  id: string;
  name: string;
  platform: string;
  publicKey: string;
  wrappedUmk?: string;
  wrappedUmkNonce?: string;
  /** Approver's public key; absent for a self-wrapped (first or recovered) device */
  approvedByPublicKey?: string;
  status: DeviceStatus;
  createdAt: Date;
  approvedAt?: Date;
  revokedAt?: Date;
  deviceDetails?: DeviceDetails;
  /** Written by passphrase recovery rather than by an approver */
  recovered?: boolean;
};

/** Read-only projection of a pending record, shown to approving devices. */
export type DeviceApprovalRequest = {
  deviceId: string;
  deviceName: string;
  platform: string;
  publicKey: string;
  requestedAt: Date;
};

function parseDate(value: unknown): Date | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseStatus(value: unknown): DeviceStatus {
  return DEVICE_STATUSES.find((status) => status === value) ?? 'pending';
}

function parseDetails(value: unknown): DeviceDetails | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  const details: DeviceDetails = {};
  for (const [key, entry] of Object.entries(value)) {
    details[key] = entry === null || entry === undefined ? null : String(entry);
  }
  return details;
}

/**
 * Parse a device document.
 *
 * Returns null for a missing document, or one without a public key or a
 * parsable `created_at`. Missing name and platform get placeholders and an
 * unknown status reads as pending.
 */
export function parseDeviceRecord(snapshot: DocumentSnapshot): DeviceRecord | null {
  const data = snapshot.data;
  if (!data) {
    return null;
  }

  const publicKey = optionalString(data.public_key);
  const createdAt = parseDate(data.created_at);
  if (!publicKey || !createdAt) {
    return null;
  }

  return {
    id: snapshot.id,
    name: optionalString(data.name) ?? 'Unknown Device',
    platform: optionalString(data.platform) ?? 'unknown',
    publicKey,
    wrappedUmk: optionalString(data.wrapped_umk),
    wrappedUmkNonce: optionalString(data.wrapped_umk_nonce),
    approvedByPublicKey: optionalString(data.approved_by_public_key),
    status: parseStatus(data.status),
    createdAt,
    approvedAt: parseDate(data.approved_at),
    revokedAt: parseDate(data.revoked_at),
    deviceDetails: parseDetails(data.device_details),
    recovered: data.recovered === true ? true : undefined,
  };
}

/** Store representation (snake_case, ISO timestamps, absent fields omitted). */
export function toDeviceDocument(record: Omit<DeviceRecord, 'id'>): DocumentData {
  return {
    name: record.name,
    platform: record.platform,
    public_key: record.publicKey,
    ...(record.wrappedUmk !== undefined && { wrapped_umk: record.wrappedUmk }),
    ...(record.wrappedUmkNonce !== undefined && { wrapped_umk_nonce: record.wrappedUmkNonce }),
    ...(record.approvedByPublicKey !== undefined && {
      approved_by_public_key: record.approvedByPublicKey,
    }),
    status: record.status,
    created_at: record.createdAt.toISOString(),
    ...(record.approvedAt && { approved_at: record.approvedAt.toISOString() }),
    ...(record.revokedAt && { revoked_at: record.revokedAt.toISOString() }),
    ...(record.deviceDetails && { device_details: record.deviceDetails }),
    ...(record.recovered && { recovered: true }),
  };
}

export function toApprovalRequest(record: DeviceRecord): DeviceApprovalRequest {
  return {
    deviceId: record.id,
    deviceName: record.name,
    platform: record.platform,
    publicKey: record.publicKey,
    requestedAt: record.createdAt,
  };
}

export function hasWrappedMasterKey(record: DeviceRecord): boolean {
  return record.wrappedUmk !== undefined && record.wrappedUmkNonce !== undefined;
}

/** "Manufacturer Model" from the details, falling back to the device name. */
export function describeDevice(record: DeviceRecord): string {
  const parts = [record.deviceDetails?.manufacturer, record.deviceDetails?.model].filter(
    (part): part is string => typeof part === 'string' && part.length > 0
  );
  return parts.length > 0 ? parts.join(' ') : record.name;
}
