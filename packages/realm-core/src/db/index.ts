/**
 * Database exports for @homeview/realm-core
 */

// Constants
export { getTableName, META_SK, CUSTOMER_SK, PREFIX, GSI, MESSAGE_ID_WIDTH } from './constants';

// Key builders
export {
  realmPK,
  subdomainGsi1PK,
  userPK,
  userSK,
  streamSK,
  recipientPK,
  messageSK,
  activitySK,
  customerPK,
  realmKeys,
  userKeys,
  streamKeys,
  customerKeys,
  extractMessageId,
} from './keys';

// Client
export { getDocClient, resetClients } from './client';

// Realm & user repository
export { getRealm, getRealmBySubdomain, getUserProfile } from './realm-repository';

// Stream repository
export { getStreamByName, getMaxMessageId } from './stream-repository';

// Activity repository
export { listUserActivity, getLatestUpdateMessageFlagActivity } from './activity-repository';

// Billing repository
export { getCustomerByRealm, customerHasPlan } from './billing-repository';

// Device repository
export { listTwoFactorDevices, getDefaultTwoFactorDevice } from './device-repository';
