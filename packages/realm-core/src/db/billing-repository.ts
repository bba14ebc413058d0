/**
 * Billing Repository
 *
 * Read-only access to Customer records and plan existence
 */

import { GetCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import type { Customer } from '../types/billing';
import { getDocClient } from './client';
import { PREFIX, getTableName } from './constants';
import { customerKeys, customerPK } from './keys';

interface CustomerItem extends Customer {
  pk: string;
  sk: string;
}

/**
 * Get the billing customer of a realm
 *
 * @returns null if the realm never set up billing
 */
export async function getCustomerByRealm(realmId: string): Promise<Customer | null> {
  const result = await getDocClient().send(
    new GetCommand({
      TableName: getTableName(),
      Key: customerKeys(realmId),
    })
  );

  if (!result.Item) {
    return null;
  }

  const { pk, sk, ...customer } = result.Item as CustomerItem;
  return customer;
}

/**
 * Whether the customer has any plan record
 */
export async function customerHasPlan(customerId: string): Promise<boolean> {
  const result = await getDocClient().send(
    new QueryCommand({
      TableName: getTableName(),
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :skPrefix)',
      ExpressionAttributeValues: {
        ':pk': customerPK(customerId),
        ':skPrefix': PREFIX.PLAN,
      },
      ProjectionExpression: 'sk',
      Limit: 1,
    })
  );

  return (result.Items?.length ?? 0) > 0;
}
