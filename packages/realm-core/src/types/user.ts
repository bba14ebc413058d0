/**
 * UserProfile Entity
 *
 * An authenticated member of a realm. Spectators (anonymous visitors of
 * a web-public realm) have no UserProfile.
 */

import type { Realm } from './realm';

/** Onboarding tutorial progress */
export type TutorialStatus = 'waiting' | 'started' | 'finished';

/** Realm role */
export type UserRole = 'owner' | 'admin' | 'moderator' | 'member' | 'guest';

/**
 * Color scheme preference, numeric values are part of the client contract
 */
export const ColorScheme = {
  Automatic: 1,
  Night: 2,
  Day: 3,
} as const;

export type ColorScheme = (typeof ColorScheme)[keyof typeof ColorScheme];

/**
 * UserProfile entity
 */
export interface UserProfile {
  // ========== Immutable ==========
  /** Primary key within the realm */
  userId: number;

  /** Owning realm */
  realmId: string;

  /** Creation timestamp (ISO8601) */
  createdAt: string;

  // ========== Mutable ==========
  /** Login email */
  email: string;

  /** Display name */
  fullName: string;

  /** Realm role */
  role: UserRole;

  /** Billing administrator flag, independent of role */
  isBillingAdmin: boolean;

  /** Color scheme preference */
  colorScheme: ColorScheme;

  /** Preferred UI language code (e.g. 'en', 'de', 'zh-hans') */
  defaultLanguage: string;

  /** Onboarding tutorial progress */
  tutorialStatus: TutorialStatus;

  /** Deactivated users cannot log in */
  isActive: boolean;
}

export function isGuest(user: UserProfile): boolean {
  return user.role === 'guest';
}

export function isRealmOwner(user: UserProfile): boolean {
  return user.role === 'owner';
}

/**
 * Owners are administrators too
 */
export function isRealmAdmin(user: UserProfile): boolean {
  return user.role === 'owner' || user.role === 'admin';
}

export function hasBillingAccess(user: UserProfile): boolean {
  return isRealmOwner(user) || user.isBillingAdmin;
}

// ============================================================
// Bot types
// ============================================================

export const BotType = {
  Default: 1,
  IncomingWebhook: 2,
  OutgoingWebhook: 3,
  Embedded: 4,
} as const;

export type BotType = (typeof BotType)[keyof typeof BotType];

/**
 * Every known bot type with its display name, in id order
 */
export const BOT_TYPE_NAMES: ReadonlyArray<readonly [BotType, string]> = [
  [BotType.Default, 'Generic bot'],
  [BotType.IncomingWebhook, 'Incoming webhook'],
  [BotType.OutgoingWebhook, 'Outgoing webhook'],
  [BotType.Embedded, 'Embedded bot'],
];

/**
 * Bot types the user is allowed to create in the given realm
 */
export function getAllowedBotTypes(
  user: UserProfile,
  realm: Realm,
  embeddedBotsEnabled: boolean
): Set<BotType> {
  const allowed = new Set<BotType>();
  if (isRealmAdmin(user) || realm.botCreationPolicy !== 'limit_generic_bots') {
    allowed.add(BotType.Default);
  }
  allowed.add(BotType.IncomingWebhook);
  allowed.add(BotType.OutgoingWebhook);
  if (embeddedBotsEnabled) {
    allowed.add(BotType.Embedded);
  }
  return allowed;
}
