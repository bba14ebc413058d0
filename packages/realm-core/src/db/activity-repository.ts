/**
 * UserActivity Repository
 */

import { QueryCommand } from '@aws-sdk/lib-dynamodb';
import { UPDATE_MESSAGE_FLAG_QUERIES, type UserActivity } from '../types/activity';
import { getDocClient } from './client';
import { getTableName } from './constants';
import { activitySK, userPK } from './keys';

interface UserActivityItem extends UserActivity {
  pk: string;
  sk: string;
}

function itemToActivity(item: UserActivityItem): UserActivity {
  const { pk, sk, ...activity } = item;
  return activity;
}

/**
 * List activity records of a user whose query starts with the prefix
 */
export async function listUserActivity(userId: number, queryPrefix = ''): Promise<UserActivity[]> {
  const result = await getDocClient().send(
    new QueryCommand({
      TableName: getTableName(),
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :skPrefix)',
      ExpressionAttributeValues: {
        ':pk': userPK(userId),
        ':skPrefix': activitySK(queryPrefix),
      },
    })
  );

  if (!result.Items) {
    return [];
  }

  return result.Items.map((item) => itemToActivity(item as UserActivityItem));
}

/**
 * Most recent message-flag update the user made, from any narrow
 *
 * @returns null if the user never marked anything as read
 */
export async function getLatestUpdateMessageFlagActivity(
  userId: number
): Promise<UserActivity | null> {
  // 'update_message_flags' is a prefix of the narrow variant, one query covers both
  const records = await listUserActivity(userId, UPDATE_MESSAGE_FLAG_QUERIES[0]);

  const flagQueries: readonly string[] = UPDATE_MESSAGE_FLAG_QUERIES;
  let latest: UserActivity | null = null;
  for (const record of records) {
    if (!flagQueries.includes(record.query)) {
      continue;
    }
    if (latest === null || Date.parse(record.lastVisit) > Date.parse(latest.lastVisit)) {
      latest = record;
    }
  }
  return latest;
}
