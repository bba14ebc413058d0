/**
 * @homeview/page-params
 *
 * Initial state document for the home view
 */

// Builder
export {
  buildPageParamsForHomePageLoad,
  promoteSponsoringInRealm,
  isTwoFactorEnabledForUser,
  CLIENT_CAPABILITIES,
} from './page-params';

// Computed fields
export { getBillingInfo, type BillingLookup } from './billing-info';
export { getUserPermissionInfo } from './permission-info';
export { getFurthestReadTime, type ActivityLookup } from './read-state';
export { getBotTypes } from './bot-types';
export {
  applyNarrowOverride,
  encodeNarrow,
  EMPTY_STREAM_MAX_MESSAGE_ID,
  type MessageLookup,
} from './narrow';

// Snapshot
export { Snapshot, isRecord, type SnapshotWrite } from './snapshot';

// Config & errors
export { loadServerSettings, parseFlag, type ServerSettings } from './config';
export { EventQueueError, InvariantViolationError, type EventQueueErrorCode } from './errors';

// Collaborators
export { createDynamoDataStore, createDynamoTwoFactor } from './collaborators/dynamo';
export {
  LambdaEventQueue,
  postProcessState,
  type LambdaEventQueueOptions,
} from './collaborators/lambda-event-queue';
export { LocaleCatalog, toLocale } from './collaborators/locale-catalog';

// Types
export type {
  SessionKind,
  RequestNotes,
  NarrowTerm,
  NarrowTermRecord,
  NarrowTarget,
  HomeDisplayOptions,
  BillingInfo,
  UserPermissionInfo,
  BotTypeEntry,
  ClientCapabilities,
  InitialState,
  RegisterOptions,
  FetchInitialStateOptions,
  EventQueue,
  HomeDataStore,
  LanguageListEntry,
  Localization,
  TwoFactor,
  PageParamsDeps,
  PageParamsResult,
} from './types';
export { sessionKindOf } from './types';
