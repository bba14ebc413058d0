/**
 * Realm Repository - DynamoDB read operations for Realm and UserProfile
 */

import { GetCommand, QueryCommand, type GetCommandInput } from '@aws-sdk/lib-dynamodb';

import type { BotCreationPolicy, PlanType, Realm } from '../types/realm';
import type { ColorScheme, TutorialStatus, UserProfile, UserRole } from '../types/user';
import { getDocClient } from './client';
import { GSI, META_SK, getTableName } from './constants';
import { realmKeys, subdomainGsi1PK, userKeys } from './keys';

/**
 * DynamoDB item structure for Realm
 */
interface RealmItem {
  pk: string;
  sk: string;
  gsi1pk: string;
  gsi1sk: string;
  realmId: string;
  name: string;
  subdomain: string;
  planType: string;
  webathenaEnabled?: boolean;
  botCreationPolicy?: string;
  createdAt: string;
}

/**
 * DynamoDB item structure for UserProfile
 */
interface UserItem {
  pk: string;
  sk: string;
  userId: number;
  realmId: string;
  email: string;
  fullName: string;
  role: string;
  isBillingAdmin?: boolean;
  colorScheme?: number;
  defaultLanguage?: string;
  tutorialStatus?: string;
  isActive: boolean;
  createdAt: string;
}

/**
 * Convert DynamoDB item to Realm entity
 */
function itemToRealm(item: RealmItem): Realm {
  return {
    realmId: item.realmId,
    name: item.name,
    subdomain: item.subdomain,
    planType: item.planType as PlanType,
    webathenaEnabled: item.webathenaEnabled ?? false,
    botCreationPolicy: (item.botCreationPolicy ?? 'everyone') as BotCreationPolicy,
    createdAt: item.createdAt,
  };
}

/**
 * Convert DynamoDB item to UserProfile entity
 */
function itemToUser(item: UserItem): UserProfile {
  return {
    userId: item.userId,
    realmId: item.realmId,
    email: item.email,
    fullName: item.fullName,
    role: item.role as UserRole,
    isBillingAdmin: item.isBillingAdmin ?? false,
    colorScheme: (item.colorScheme ?? 1) as ColorScheme,
    defaultLanguage: item.defaultLanguage ?? 'en',
    tutorialStatus: (item.tutorialStatus ?? 'finished') as TutorialStatus,
    isActive: item.isActive,
    createdAt: item.createdAt,
  };
}

/**
 * Get a realm by ID
 */
export async function getRealm(realmId: string): Promise<Realm | null> {
  const params: GetCommandInput = {
    TableName: getTableName(),
    Key: realmKeys(realmId),
  };

  const result = await getDocClient().send(new GetCommand(params));

  if (!result.Item) {
    return null;
  }

  return itemToRealm(result.Item as RealmItem);
}

/**
 * Get a realm by the subdomain it is served on
 */
export async function getRealmBySubdomain(subdomain: string): Promise<Realm | null> {
  const result = await getDocClient().send(
    new QueryCommand({
      TableName: getTableName(),
      IndexName: GSI.SUBDOMAIN,
      KeyConditionExpression: 'gsi1pk = :pk AND gsi1sk = :sk',
      ExpressionAttributeValues: {
        ':pk': subdomainGsi1PK(subdomain),
        ':sk': META_SK,
      },
      Limit: 1,
    })
  );

  if (!result.Items || result.Items.length === 0) {
    return null;
  }

  return itemToRealm(result.Items[0] as RealmItem);
}

/**
 * Get a user of the realm; deactivated users are returned as well
 */
export async function getUserProfile(realmId: string, userId: number): Promise<UserProfile | null> {
  const result = await getDocClient().send(
    new GetCommand({
      TableName: getTableName(),
      Key: userKeys(realmId, userId),
    })
  );

  if (!result.Item) {
    return null;
  }

  return itemToUser(result.Item as UserItem);
}
