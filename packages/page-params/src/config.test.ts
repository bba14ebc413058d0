import { describe, expect, it } from 'vitest';
import { loadServerSettings, parseFlag } from './config';

describe('parseFlag', () => {
  it('should accept common truthy spellings', () => {
    expect(parseFlag('true')).toBe(true);
    expect(parseFlag('TRUE')).toBe(true);
    expect(parseFlag(' 1 ')).toBe(true);
    expect(parseFlag('yes')).toBe(true);
    expect(parseFlag('false')).toBe(false);
    expect(parseFlag('0')).toBe(false);
  });

  it('should fall back for unset values', () => {
    expect(parseFlag(undefined)).toBe(false);
    expect(parseFlag('', true)).toBe(true);
  });
});

describe('loadServerSettings', () => {
  it('should use defaults for an empty environment', () => {
    const settings = loadServerSettings({});

    expect(settings).toMatchObject({
      testSuite: false,
      loginPage: '/login/',
      warnNoEmail: false,
      searchPillsEnabled: false,
      corporateEnabled: false,
      promoteSponsoring: false,
      twoFactorAuthenticationEnabled: false,
      embeddedBotsEnabled: false,
      appsPageUrl: '/apps/',
    });
    expect(settings.localeDir.endsWith('locale')).toBe(true);
  });

  it('should read every setting from the environment', () => {
    const settings = loadServerSettings({
      TEST_SUITE: '1',
      HOME_NOT_LOGGED_IN: '/accounts/login/',
      WARN_NO_EMAIL: 'true',
      SEARCH_PILLS_ENABLED: 'yes',
      CORPORATE_ENABLED: 'true',
      PROMOTE_SPONSORING_ZULIP: 'true',
      TWO_FACTOR_AUTHENTICATION_ENABLED: 'true',
      EMBEDDED_BOTS_ENABLED: 'true',
      APPS_PAGE_URL: 'https://apps.example.com/',
      LOCALE_DIR: '/srv/locale',
    });

    expect(settings).toEqual({
      testSuite: true,
      loginPage: '/accounts/login/',
      warnNoEmail: true,
      searchPillsEnabled: true,
      corporateEnabled: true,
      promoteSponsoring: true,
      twoFactorAuthenticationEnabled: true,
      embeddedBotsEnabled: true,
      appsPageUrl: 'https://apps.example.com/',
      localeDir: '/srv/locale',
    });
  });
});
