/**
 * DynamoDB Table Constants
 */

/**
 * Table name, read at call time so that tests and local tooling can
 * switch tables through the environment
 */
export function getTableName(): string {
  return process.env.HOMEVIEW_TABLE || 'homeview-dev';
}

// Sort key constants
export const META_SK = '#META';
export const CUSTOMER_SK = 'CUSTOMER';

// Key prefixes for Single Table Design
export const PREFIX = {
  REALM: 'REALM#',
  SUBDOMAIN: 'SUBDOMAIN#',
  USER: 'USER#',
  STREAM: 'STREAM#',
  RECIPIENT: 'RECIPIENT#',
  MESSAGE: 'MSG#',
  ACTIVITY: 'ACTIVITY#',
  CUSTOMER: 'CUSTOMER#',
  PLAN: 'PLAN#',
  DEVICE: 'DEVICE#',
} as const;

// GSI names
export const GSI = {
  /** GSI1: Realm lookup by subdomain */
  SUBDOMAIN: 'gsi1-subdomain-index',
} as const;

/** Message ids are zero-padded so that sort keys order numerically */
export const MESSAGE_ID_WIDTH = 16;
