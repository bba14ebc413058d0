import {
  BOT_TYPE_NAMES,
  getAllowedBotTypes,
  type Realm,
  type UserProfile,
} from '@homeview/realm-core';
import type { BotTypeEntry } from './types';

/**
 * Every bot type, tagged with whether the user may create it.
 * Spectators cannot create bots and get an empty list.
 */
export function getBotTypes(
  user: UserProfile | null,
  realm: Realm,
  embeddedBotsEnabled: boolean
): BotTypeEntry[] {
  if (user === null) {
    return [];
  }

  const allowed = getAllowedBotTypes(user, realm, embeddedBotsEnabled);
  return BOT_TYPE_NAMES.map(([typeId, name]) => ({
    type_id: typeId,
    name,
    allowed: allowed.has(typeId),
  }));
}
