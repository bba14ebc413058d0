/**
 * Stream Repository
 *
 * Stream lookup and per-recipient message queries
 */

import { GetCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import type { Stream } from '../types/stream';
import { getDocClient } from './client';
import { PREFIX, getTableName } from './constants';
import { extractMessageId, recipientPK, streamKeys } from './keys';

interface StreamItem extends Stream {
  pk: string;
  sk: string;
}

function itemToStream(item: StreamItem): Stream {
  const { pk, sk, ...stream } = item;
  return stream;
}

/**
 * Get a stream by name, ignoring case
 */
export async function getStreamByName(realmId: string, name: string): Promise<Stream | null> {
  const result = await getDocClient().send(
    new GetCommand({
      TableName: getTableName(),
      Key: streamKeys(realmId, name),
    })
  );

  if (!result.Item) {
    return null;
  }

  return itemToStream(result.Item as StreamItem);
}

/**
 * Highest message id addressed to the recipient
 *
 * @returns null when the recipient has no messages
 */
export async function getMaxMessageId(recipientId: number): Promise<number | null> {
  const result = await getDocClient().send(
    new QueryCommand({
      TableName: getTableName(),
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :skPrefix)',
      ExpressionAttributeValues: {
        ':pk': recipientPK(recipientId),
        ':skPrefix': PREFIX.MESSAGE,
      },
      ProjectionExpression: 'sk',
      ScanIndexForward: false,
      Limit: 1,
    })
  );

  if (!result.Items || result.Items.length === 0) {
    return null;
  }

  const sk: unknown = result.Items[0].sk;
  return typeof sk === 'string' ? extractMessageId(sk) : null;
}
