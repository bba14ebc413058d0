/**
 * Server Settings
 *
 * 从环境变量加载配置，调用时读取
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Process-wide settings the page params depend on
 */
export interface ServerSettings {
  /** Running under the test suite */
  testSuite: boolean;
  /** Where logged-out visitors are sent */
  loginPage: string;
  /** Warn admins that outgoing email is not configured */
  warnNoEmail: boolean;
  searchPillsEnabled: boolean;
  /** Hosted deployment with billing */
  corporateEnabled: boolean;
  /** Advertise sponsoring in non-paying realms */
  promoteSponsoring: boolean;
  twoFactorAuthenticationEnabled: boolean;
  embeddedBotsEnabled: boolean;
  appsPageUrl: string;
  /** Directory holding language_name_map.json and per-locale catalogs */
  localeDir: string;
}

const DEFAULT_LOCALE_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../../locale'
);

/**
 * Parse a boolean environment flag
 */
export function parseFlag(value: string | undefined, fallback = false): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Load settings from the environment
 */
export function loadServerSettings(env: NodeJS.ProcessEnv = process.env): ServerSettings {
  return {
    testSuite: parseFlag(env.TEST_SUITE),
    loginPage: env.HOME_NOT_LOGGED_IN || '/login/',
    warnNoEmail: parseFlag(env.WARN_NO_EMAIL),
    searchPillsEnabled: parseFlag(env.SEARCH_PILLS_ENABLED),
    corporateEnabled: parseFlag(env.CORPORATE_ENABLED),
    promoteSponsoring: parseFlag(env.PROMOTE_SPONSORING_ZULIP),
    twoFactorAuthenticationEnabled: parseFlag(env.TWO_FACTOR_AUTHENTICATION_ENABLED),
    embeddedBotsEnabled: parseFlag(env.EMBEDDED_BOTS_ENABLED),
    appsPageUrl: env.APPS_PAGE_URL || '/apps/',
    localeDir: env.LOCALE_DIR || DEFAULT_LOCALE_DIR,
  };
}
