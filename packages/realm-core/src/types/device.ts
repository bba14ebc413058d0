/**
 * Two-factor Device Entity
 */

/** Device kind */
export type TwoFactorDeviceKind = 'totp' | 'phone' | 'static';

export interface TwoFactorDevice {
  /** Device ID */
  deviceId: string;

  /** Owning user */
  userId: number;

  /** Device name, the primary device is named 'default' */
  name: string;

  /** Device kind */
  kind: TwoFactorDeviceKind;

  /** Enrollment finished */
  confirmed: boolean;

  /** Creation timestamp (ISO8601) */
  createdAt: string;
}

/** Name of the device used for login challenges */
export const DEFAULT_DEVICE_NAME = 'default';
