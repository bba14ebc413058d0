/**
 * Page params types and collaborator interfaces
 */

import type {
  Customer,
  Realm,
  Stream,
  TwoFactorDevice,
  UserActivity,
  UserProfile,
} from '@homeview/realm-core';
import type { ServerSettings } from './config';
import type { Snapshot } from './snapshot';

// ============================================================
// Session & request
// ============================================================

/**
 * Who is loading the home view
 */
export type SessionKind =
  | { kind: 'authenticated'; user: UserProfile }
  | { kind: 'anonymous' };

export function sessionKindOf(user: UserProfile | null): SessionKind {
  return user === null ? { kind: 'anonymous' } : { kind: 'authenticated', user };
}

/**
 * Per-request notes. The builder records the language it picked in
 * `language` so the response layer can set the language cookie.
 */
export interface RequestNotes {
  /** Client name resolved from the User-Agent, required for authenticated sessions */
  client: string | null;
  /** Request path, may carry a language prefix such as /de/ */
  path: string;
  /** Language chosen for this request */
  language: string | null;
}

// ============================================================
// Narrow
// ============================================================

/**
 * A narrow term as sent by the client: [operator, operand]
 */
export type NarrowTerm = readonly [operator: string, operand: string];

export interface NarrowTermRecord {
  operator: string;
  operand: string;
}

/**
 * Stream (and optional topic) the view is narrowed to
 */
export interface NarrowTarget {
  stream: Stream;
  topic: string | null;
}

export interface HomeDisplayOptions {
  insecureDesktopApp: boolean;
  narrow: NarrowTerm[];
  narrowStream: Stream | null;
  narrowTopic: string | null;
  firstInRealm: boolean;
  promptForInvites: boolean;
  needsTutorial: boolean;
}

// ============================================================
// Computed fields
// ============================================================

export interface BillingInfo {
  showBilling: boolean;
  showPlans: boolean;
}

export interface UserPermissionInfo {
  colorScheme: number;
  isGuest: boolean;
  isRealmAdmin: boolean;
  isRealmOwner: boolean;
  showWebathena: boolean;
}

export interface BotTypeEntry {
  type_id: number;
  name: string;
  allowed: boolean;
}

// ============================================================
// Event queue
// ============================================================

/**
 * Optional protocol features the web client supports
 */
export interface ClientCapabilities {
  notification_settings_null: boolean;
  bulk_message_deletion: boolean;
  user_avatar_url_field_optional: boolean;
  stream_typing_notifications: boolean;
  user_settings_object: boolean;
}

/**
 * Initial state returned by the event queue; keys are client field names
 */
export type InitialState = Record<string, unknown>;

export interface RegisterOptions {
  applyMarkdown: boolean;
  clientGravatar: boolean;
  slimPresence: boolean;
  clientCapabilities: ClientCapabilities;
  narrow: NarrowTerm[];
  includeStreams: boolean;
}

export interface FetchInitialStateOptions {
  /** null fetches every event type */
  eventTypes: string[] | null;
  queueId: string | null;
  clientGravatar: boolean;
  userAvatarUrlFieldOptional: boolean;
  userSettingsObject: boolean;
  slimPresence: boolean;
  includeSubscribers: boolean;
  includeStreams: boolean;
}

export interface EventQueue {
  /**
   * Allocate an event queue for the user and return its initial state,
   * which carries the new `queue_id`
   */
  register(user: UserProfile, client: string, options: RegisterOptions): Promise<InitialState>;

  /**
   * Fetch state without allocating a queue
   */
  fetchInitialState(
    user: UserProfile | null,
    realm: Realm,
    options: FetchInitialStateOptions
  ): Promise<InitialState>;

  /**
   * Convert raw fetched state into its client shape, in place
   */
  postProcess(user: UserProfile | null, state: InitialState, queueBacked: boolean): void;
}

// ============================================================
// Data store, localization, two-factor
// ============================================================

export interface HomeDataStore {
  getMaxMessageId(recipientId: number): Promise<number | null>;
  getLatestUpdateMessageFlagActivity(userId: number): Promise<UserActivity | null>;
  getCustomerByRealm(realmId: string): Promise<Customer | null>;
  customerHasPlan(customerId: string): Promise<boolean>;
}

export interface LanguageListEntry {
  name: string;
  code: string;
  locale: string;
  percent_translated?: number;
}

export interface Localization {
  /** Supported language named by the request path prefix, if any */
  getLanguageFromPath(path: string): Promise<string | null>;
  resolveLanguage(pathLanguage: string | null, userDefaultLanguage: string): string;
  getLanguageTranslationData(language: string): Promise<Record<string, string>>;
  getLanguageList(): Promise<LanguageListEntry[]>;
}

export interface TwoFactor {
  defaultDevice(user: UserProfile): Promise<TwoFactorDevice | null>;
}

/**
 * Everything the page params builder talks to
 */
export interface PageParamsDeps {
  settings: ServerSettings;
  store: HomeDataStore;
  eventQueue: EventQueue;
  i18n: Localization;
  twoFactor: TwoFactor;
}

export interface PageParamsResult {
  /** null for spectators, who get no event queue */
  queueId: string | null;
  pageParams: Snapshot;
}
