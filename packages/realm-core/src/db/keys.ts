/**
 * DynamoDB Key Builders
 */

import { CUSTOMER_SK, MESSAGE_ID_WIDTH, META_SK, PREFIX } from './constants';

/**
 * Build primary key for Realm-scoped items
 */
export function realmPK(realmId: string): string {
  return `${PREFIX.REALM}${realmId}`;
}

/**
 * Build GSI1 primary key for the subdomain index
 */
export function subdomainGsi1PK(subdomain: string): string {
  return `${PREFIX.SUBDOMAIN}${subdomain}`;
}

/**
 * Build primary key for user-scoped items (activity, devices)
 */
export function userPK(userId: number): string {
  return `${PREFIX.USER}${userId}`;
}

export function userSK(userId: number): string {
  return `${PREFIX.USER}${userId}`;
}

/**
 * Stream names are unique ignoring case, so the key is lowercased
 */
export function streamSK(name: string): string {
  return `${PREFIX.STREAM}${name.toLowerCase()}`;
}

export function recipientPK(recipientId: number): string {
  return `${PREFIX.RECIPIENT}${recipientId}`;
}

export function messageSK(messageId: number): string {
  return `${PREFIX.MESSAGE}${String(messageId).padStart(MESSAGE_ID_WIDTH, '0')}`;
}

export function activitySK(query: string): string {
  return `${PREFIX.ACTIVITY}${query}`;
}

export function customerPK(customerId: string): string {
  return `${PREFIX.CUSTOMER}${customerId}`;
}

/**
 * Realm item keys
 */
export function realmKeys(realmId: string) {
  return {
    pk: realmPK(realmId),
    sk: META_SK,
  };
}

/**
 * UserProfile item keys
 */
export function userKeys(realmId: string, userId: number) {
  return {
    pk: realmPK(realmId),
    sk: userSK(userId),
  };
}

/**
 * Stream item keys
 */
export function streamKeys(realmId: string, name: string) {
  return {
    pk: realmPK(realmId),
    sk: streamSK(name),
  };
}

/**
 * Customer item keys
 */
export function customerKeys(realmId: string) {
  return {
    pk: realmPK(realmId),
    sk: CUSTOMER_SK,
  };
}

/**
 * Extract message ID from a message SK
 */
export function extractMessageId(sk: string): number | null {
  if (!sk.startsWith(PREFIX.MESSAGE)) {
    return null;
  }
  const id = Number.parseInt(sk.slice(PREFIX.MESSAGE.length), 10);
  return Number.isNaN(id) ? null : id;
}
