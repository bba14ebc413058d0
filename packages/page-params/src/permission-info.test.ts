import { describe, expect, it } from 'vitest';
import { getBotTypes } from './bot-types';
import { getUserPermissionInfo } from './permission-info';
import { makeRealm, makeUser } from './test-fixtures';

describe('getUserPermissionInfo', () => {
  it('should return fixed defaults for spectators', () => {
    expect(getUserPermissionInfo(null, makeRealm({ webathenaEnabled: true }))).toEqual({
      colorScheme: 1,
      isGuest: false,
      isRealmAdmin: false,
      isRealmOwner: false,
      showWebathena: false,
    });
  });

  it('should project the user and realm', () => {
    const info = getUserPermissionInfo(
      makeUser({ role: 'owner', colorScheme: 3 }),
      makeRealm({ webathenaEnabled: true })
    );

    expect(info).toEqual({
      colorScheme: 3,
      isGuest: false,
      isRealmAdmin: true,
      isRealmOwner: true,
      showWebathena: true,
    });
  });

  it('should flag guests', () => {
    const info = getUserPermissionInfo(makeUser({ role: 'guest' }), makeRealm());

    expect(info.isGuest).toBe(true);
    expect(info.isRealmAdmin).toBe(false);
  });
});

describe('getBotTypes', () => {
  it('should be empty for spectators', () => {
    expect(getBotTypes(null, makeRealm(), true)).toEqual([]);
  });

  it('should list every bot type with its permission', () => {
    const realm = makeRealm({ botCreationPolicy: 'limit_generic_bots' });

    expect(getBotTypes(makeUser(), realm, false)).toEqual([
      { type_id: 1, name: 'Generic bot', allowed: false },
      { type_id: 2, name: 'Incoming webhook', allowed: true },
      { type_id: 3, name: 'Outgoing webhook', allowed: true },
      { type_id: 4, name: 'Embedded bot', allowed: false },
    ]);
  });
});
