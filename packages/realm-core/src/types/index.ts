/**
 * Type exports for @homeview/realm-core
 */

// Realm types
export type { Realm, PlanType, BotCreationPolicy } from './realm';
export { NON_PAYING_PLAN_TYPES } from './realm';

// User types
export type { UserProfile, UserRole, TutorialStatus } from './user';
export {
  ColorScheme,
  BotType,
  BOT_TYPE_NAMES,
  isGuest,
  isRealmAdmin,
  isRealmOwner,
  hasBillingAccess,
  getAllowedBotTypes,
} from './user';

// Stream types
export type { Stream } from './stream';

// Activity types
export type { UserActivity } from './activity';
export { UPDATE_MESSAGE_FLAG_QUERIES } from './activity';

// Billing types
export type { Customer } from './billing';

// Device types
export type { TwoFactorDevice, TwoFactorDeviceKind } from './device';
export { DEFAULT_DEVICE_NAME } from './device';
