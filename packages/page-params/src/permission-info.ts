import {
  ColorScheme,
  isGuest,
  isRealmAdmin,
  isRealmOwner,
  type Realm,
  type UserProfile,
} from '@homeview/realm-core';
import type { UserPermissionInfo } from './types';

const SPECTATOR_PERMISSIONS: UserPermissionInfo = {
  colorScheme: ColorScheme.Automatic,
  isGuest: false,
  isRealmAdmin: false,
  isRealmOwner: false,
  showWebathena: false,
};

/**
 * Permission view of the current user; spectators get fixed defaults
 */
export function getUserPermissionInfo(
  user: UserProfile | null,
  realm: Realm
): UserPermissionInfo {
  if (user === null) {
    return { ...SPECTATOR_PERMISSIONS };
  }
  return {
    colorScheme: user.colorScheme,
    isGuest: isGuest(user),
    isRealmAdmin: isRealmAdmin(user),
    isRealmOwner: isRealmOwner(user),
    showWebathena: realm.webathenaEnabled,
  };
}
