/**
 * In-process fakes for page params tests
 */

import type {
  Customer,
  Realm,
  Stream,
  TwoFactorDevice,
  UserActivity,
  UserProfile,
} from '@homeview/realm-core';
import { postProcessState } from './collaborators/lambda-event-queue';
import type { ServerSettings } from './config';
import type {
  EventQueue,
  FetchInitialStateOptions,
  HomeDataStore,
  InitialState,
  LanguageListEntry,
  Localization,
  PageParamsDeps,
  RegisterOptions,
  RequestNotes,
  TwoFactor,
} from './types';

export const makeRealm = (overrides: Partial<Realm> = {}): Realm => ({
  realmId: 'realm-1',
  name: 'Test Realm',
  subdomain: 'test',
  planType: 'standard',
  webathenaEnabled: false,
  botCreationPolicy: 'everyone',
  createdAt: '2024-01-01T00:00:00.000Z',
  ...overrides,
});

export const makeUser = (overrides: Partial<UserProfile> = {}): UserProfile => ({
  userId: 10,
  realmId: 'realm-1',
  email: 'hamlet@example.com',
  fullName: 'King Hamlet',
  role: 'member',
  isBillingAdmin: false,
  colorScheme: 2,
  defaultLanguage: 'en',
  tutorialStatus: 'finished',
  isActive: true,
  createdAt: '2024-01-01T00:00:00.000Z',
  ...overrides,
});

export const makeStream = (overrides: Partial<Stream> = {}): Stream => ({
  streamId: 3,
  realmId: 'realm-1',
  name: 'Denmark',
  recipientId: 30,
  createdAt: '2024-01-01T00:00:00.000Z',
  ...overrides,
});

export const makeSettings = (overrides: Partial<ServerSettings> = {}): ServerSettings => ({
  testSuite: true,
  loginPage: '/login/',
  warnNoEmail: false,
  searchPillsEnabled: false,
  corporateEnabled: false,
  promoteSponsoring: false,
  twoFactorAuthenticationEnabled: false,
  embeddedBotsEnabled: false,
  appsPageUrl: '/apps/',
  localeDir: '/nonexistent',
  ...overrides,
});

export const makeRequest = (overrides: Partial<RequestNotes> = {}): RequestNotes => ({
  client: 'website',
  path: '/',
  language: null,
  ...overrides,
});

export class FakeStore implements HomeDataStore {
  readonly customers = new Map<string, Customer>();
  readonly customersWithPlans = new Set<string>();
  readonly activity = new Map<number, UserActivity>();
  readonly messages = new Map<number, number[]>();
  readonly calls: string[] = [];

  async getMaxMessageId(recipientId: number): Promise<number | null> {
    this.calls.push(`getMaxMessageId:${recipientId}`);
    const ids = this.messages.get(recipientId) ?? [];
    return ids.length === 0 ? null : Math.max(...ids);
  }

  async getLatestUpdateMessageFlagActivity(userId: number): Promise<UserActivity | null> {
    this.calls.push(`getLatestUpdateMessageFlagActivity:${userId}`);
    return this.activity.get(userId) ?? null;
  }

  async getCustomerByRealm(realmId: string): Promise<Customer | null> {
    this.calls.push(`getCustomerByRealm:${realmId}`);
    return this.customers.get(realmId) ?? null;
  }

  async customerHasPlan(customerId: string): Promise<boolean> {
    this.calls.push(`customerHasPlan:${customerId}`);
    return this.customersWithPlans.has(customerId);
  }
}

export class FakeEventQueue implements EventQueue {
  readonly registrations: Array<{ user: UserProfile; client: string; options: RegisterOptions }> = [];
  readonly fetches: Array<{ user: UserProfile | null; realm: Realm; options: FetchInitialStateOptions }> =
    [];
  readonly postProcessed: boolean[] = [];

  /** Replace to customize what the queue returns */
  registerState: (user: UserProfile) => InitialState = (user) => ({
    queue_id: 'queue-1',
    realm_name: 'Test Realm',
    user_settings: { default_language: user.defaultLanguage, enable_desktop_notifications: true },
  });

  fetchState: () => InitialState = () => ({
    queue_id: null,
    realm_name: 'Test Realm',
    user_settings: { default_language: 'en', enable_desktop_notifications: true },
    raw_users: {
      '2': { user_id: 2, full_name: 'Othello', is_active: false },
      '1': { user_id: 1, full_name: 'Iago', is_active: true },
    },
  });

  async register(user: UserProfile, client: string, options: RegisterOptions): Promise<InitialState> {
    this.registrations.push({ user, client, options });
    return this.registerState(user);
  }

  async fetchInitialState(
    user: UserProfile | null,
    realm: Realm,
    options: FetchInitialStateOptions
  ): Promise<InitialState> {
    this.fetches.push({ user, realm, options });
    return this.fetchState();
  }

  postProcess(_user: UserProfile | null, state: InitialState, queueBacked: boolean): void {
    this.postProcessed.push(queueBacked);
    postProcessState(state, queueBacked);
  }
}

export class FakeLocalization implements Localization {
  readonly languages: LanguageListEntry[] = [
    { name: 'Deutsch', code: 'de', locale: 'de' },
    { name: 'English', code: 'en', locale: 'en' },
    { name: 'Français', code: 'fr', locale: 'fr' },
  ];

  async getLanguageFromPath(path: string): Promise<string | null> {
    const prefix = path.split('/')[1] ?? '';
    return this.languages.some((l) => l.code === prefix) ? prefix : null;
  }

  resolveLanguage(pathLanguage: string | null, userDefaultLanguage: string): string {
    return pathLanguage ?? userDefaultLanguage;
  }

  async getLanguageTranslationData(language: string): Promise<Record<string, string>> {
    return language === 'en' ? {} : { Settings: `Settings (${language})` };
  }

  async getLanguageList(): Promise<LanguageListEntry[]> {
    return this.languages;
  }
}

export class FakeTwoFactor implements TwoFactor {
  readonly devices = new Map<number, TwoFactorDevice>();
  readonly lookups: number[] = [];

  async defaultDevice(user: UserProfile): Promise<TwoFactorDevice | null> {
    this.lookups.push(user.userId);
    return this.devices.get(user.userId) ?? null;
  }
}

export interface FakeDeps extends PageParamsDeps {
  store: FakeStore;
  eventQueue: FakeEventQueue;
  i18n: FakeLocalization;
  twoFactor: FakeTwoFactor;
}

export const makeDeps = (settings: Partial<ServerSettings> = {}): FakeDeps => ({
  settings: makeSettings(settings),
  store: new FakeStore(),
  eventQueue: new FakeEventQueue(),
  i18n: new FakeLocalization(),
  twoFactor: new FakeTwoFactor(),
});
