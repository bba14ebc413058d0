/**
 * Home page params
 *
 * Builds the initial state document the web app boots from. Logged-in
 * users get a freshly registered event queue; spectators get a one-off
 * state fetch and no queue, since events are not delivered to them.
 */

import { NON_PAYING_PLAN_TYPES, type Realm, type UserProfile } from '@homeview/realm-core';
import type { ServerSettings } from './config';
import { getBillingInfo } from './billing-info';
import { getBotTypes } from './bot-types';
import { InvariantViolationError } from './errors';
import { applyNarrowOverride } from './narrow';
import { getUserPermissionInfo } from './permission-info';
import { getFurthestReadTime } from './read-state';
import { Snapshot, isRecord } from './snapshot';
import {
  sessionKindOf,
  type ClientCapabilities,
  type HomeDisplayOptions,
  type InitialState,
  type PageParamsDeps,
  type PageParamsResult,
  type RequestNotes,
  type SessionKind,
  type TwoFactor,
} from './types';

export const CLIENT_CAPABILITIES: Readonly<ClientCapabilities> = Object.freeze({
  notification_settings_null: true,
  bulk_message_deletion: true,
  user_avatar_url_field_optional: true,
  // Flip once the web app renders stream typing notifications.
  stream_typing_notifications: false,
  user_settings_object: true,
});

/**
 * Advertise sponsoring in the gear menu of non-paying realms
 */
export function promoteSponsoringInRealm(realm: Realm, settings: ServerSettings): boolean {
  if (!settings.promoteSponsoring) {
    return false;
  }
  return NON_PAYING_PLAN_TYPES.includes(realm.planType);
}

/**
 * Whether the user has a second factor set up. The device lookup is
 * only made when two-factor authentication is enabled at all.
 */
export async function isTwoFactorEnabledForUser(
  user: UserProfile | null,
  twoFactorEnabled: boolean,
  twoFactor: TwoFactor
): Promise<boolean> {
  if (!twoFactorEnabled || user === null) {
    return false;
  }
  return (await twoFactor.defaultDevice(user)) !== null;
}

async function fetchSessionState(
  session: SessionKind,
  request: RequestNotes,
  realm: Realm,
  display: HomeDisplayOptions,
  deps: PageParamsDeps
): Promise<InitialState> {
  switch (session.kind) {
    case 'authenticated': {
      if (request.client === null) {
        throw new InvariantViolationError('authenticated request has no client');
      }
      return deps.eventQueue.register(session.user, request.client, {
        applyMarkdown: true,
        clientGravatar: true,
        slimPresence: true,
        clientCapabilities: { ...CLIENT_CAPABILITIES },
        narrow: display.narrow,
        includeStreams: false,
      });
    }
    case 'anonymous': {
      // No event queue for spectators, the state is only fetched once.
      const state = await deps.eventQueue.fetchInitialState(null, realm, {
        eventTypes: null,
        queueId: null,
        clientGravatar: false,
        userAvatarUrlFieldOptional: CLIENT_CAPABILITIES.user_avatar_url_field_optional,
        userSettingsObject: CLIENT_CAPABILITIES.user_settings_object,
        slimPresence: false,
        includeSubscribers: false,
        includeStreams: false,
      });
      deps.eventQueue.postProcess(null, state, false);
      return state;
    }
  }
}

function readDefaultLanguage(state: InitialState): string {
  const userSettings = state.user_settings;
  if (!isRecord(userSettings) || typeof userSettings.default_language !== 'string') {
    throw new InvariantViolationError('initial state has no user_settings.default_language');
  }
  return userSettings.default_language;
}

function readQueueId(session: SessionKind, state: InitialState): string | null {
  const queueId = state.queue_id ?? null;
  if (session.kind === 'anonymous') {
    return null;
  }
  if (typeof queueId !== 'string') {
    throw new InvariantViolationError('event queue registration returned no queue_id');
  }
  return queueId;
}

/**
 * Compute the page params sent to the client when it loads the home view
 */
export async function buildPageParamsForHomePageLoad(
  request: RequestNotes,
  user: UserProfile | null,
  realm: Realm,
  display: HomeDisplayOptions,
  deps: PageParamsDeps
): Promise<PageParamsResult> {
  const { settings, store, i18n } = deps;
  const session = sessionKindOf(user);

  const state = await fetchSessionState(session, request, realm, display, deps);
  const queueId = readQueueId(session, state);

  const furthestReadTime = await getFurthestReadTime(user, store);

  const pathLanguage = await i18n.getLanguageFromPath(request.path);
  const requestLanguage = i18n.resolveLanguage(pathLanguage, readDefaultLanguage(state));
  request.language = requestLanguage;

  const twoFaEnabled = settings.twoFactorAuthenticationEnabled && user !== null;
  const billingInfo = await getBillingInfo(user, realm, settings.corporateEnabled, store);
  const permissionInfo = getUserPermissionInfo(user, realm);
  const twoFaEnabledUser = await isTwoFactorEnabledForUser(user, twoFaEnabled, deps.twoFactor);

  const pageParams = new Snapshot();

  // Server settings
  pageParams
    .set('test_suite', settings.testSuite)
    .set('insecure_desktop_app', display.insecureDesktopApp)
    .set('login_page', settings.loginPage)
    .set('warn_no_email', settings.warnNoEmail)
    .set('search_pills_enabled', settings.searchPillsEnabled)
    .set('corporate_enabled', settings.corporateEnabled);

  // Misc. extra data
  pageParams
    .set('language_list', await i18n.getLanguageList())
    .set('needs_tutorial', display.needsTutorial)
    .set('first_in_realm', display.firstInRealm)
    .set('prompt_for_invites', display.promptForInvites)
    .set('furthest_read_time', furthestReadTime)
    .set('bot_types', getBotTypes(user, realm, settings.embeddedBotsEnabled))
    .set('two_fa_enabled', twoFaEnabled)
    .set('apps_page_url', settings.appsPageUrl)
    .set('show_billing', billingInfo.showBilling)
    .set('promote_sponsoring_zulip', promoteSponsoringInRealm(realm, settings))
    .set('show_plans', billingInfo.showPlans)
    .set('show_webathena', permissionInfo.showWebathena)
    .set('two_fa_enabled_user', twoFaEnabledUser)
    .set('is_spectator', session.kind === 'anonymous')
    .set('no_event_queue', session.kind === 'anonymous');

  pageParams.merge(state);

  if (display.narrowStream !== null) {
    await applyNarrowOverride(
      pageParams,
      { stream: display.narrowStream, topic: display.narrowTopic },
      display.narrow,
      store
    );
  }

  pageParams.set('translation_data', await i18n.getLanguageTranslationData(requestLanguage));

  return { queueId, pageParams };
}
