/**
 * DynamoDB-backed collaborators
 */

import {
  customerHasPlan,
  getCustomerByRealm,
  getDefaultTwoFactorDevice,
  getLatestUpdateMessageFlagActivity,
  getMaxMessageId,
} from '@homeview/realm-core';
import type { HomeDataStore, TwoFactor } from '../types';

export function createDynamoDataStore(): HomeDataStore {
  return {
    getMaxMessageId,
    getLatestUpdateMessageFlagActivity,
    getCustomerByRealm,
    customerHasPlan,
  };
}

export function createDynamoTwoFactor(): TwoFactor {
  return {
    defaultDevice: (user) => getDefaultTwoFactorDevice(user.userId),
  };
}
