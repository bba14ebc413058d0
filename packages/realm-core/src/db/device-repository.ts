/**
 * Two-factor Device Repository
 */

import { QueryCommand } from '@aws-sdk/lib-dynamodb';
import { DEFAULT_DEVICE_NAME, type TwoFactorDevice } from '../types/device';
import { getDocClient } from './client';
import { PREFIX, getTableName } from './constants';
import { userPK } from './keys';

interface TwoFactorDeviceItem extends TwoFactorDevice {
  pk: string;
  sk: string;
}

function itemToDevice(item: TwoFactorDeviceItem): TwoFactorDevice {
  const { pk, sk, ...device } = item;
  return device;
}

/**
 * List a user's two-factor devices
 */
export async function listTwoFactorDevices(
  userId: number,
  options: { confirmedOnly?: boolean } = {}
): Promise<TwoFactorDevice[]> {
  const result = await getDocClient().send(
    new QueryCommand({
      TableName: getTableName(),
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :skPrefix)',
      ExpressionAttributeValues: {
        ':pk': userPK(userId),
        ':skPrefix': PREFIX.DEVICE,
      },
    })
  );

  if (!result.Items) {
    return [];
  }

  const devices = result.Items.map((item) => itemToDevice(item as TwoFactorDeviceItem));
  return options.confirmedOnly ? devices.filter((d) => d.confirmed) : devices;
}

/**
 * The confirmed device used for login challenges, if any
 */
export async function getDefaultTwoFactorDevice(userId: number): Promise<TwoFactorDevice | null> {
  const devices = await listTwoFactorDevices(userId, { confirmedOnly: true });
  return devices.find((d) => d.name === DEFAULT_DEVICE_NAME) ?? null;
}
