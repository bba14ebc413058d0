/**
 * Home API Lambda
 *
 * GET /home?narrow=<json>&stream=<name>&topic=<name>&path=<path>
 *
 * Returns the page params the web app boots from. The realm comes from
 * the Host header; the user, when logged in, from the authorizer context.
 */

import { LambdaClient } from '@aws-sdk/client-lambda';
import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  getRealmBySubdomain,
  getStreamByName,
  getUserProfile,
  type Realm,
  type UserProfile,
} from '@homeview/realm-core';
import {
  LambdaEventQueue,
  LocaleCatalog,
  buildPageParamsForHomePageLoad,
  createDynamoDataStore,
  createDynamoTwoFactor,
  loadServerSettings,
  type HomeDisplayOptions,
  type PageParamsDeps,
  type RequestNotes,
} from '@homeview/page-params';
import { InvalidNarrowError, RealmNotFoundError } from './utils/errors';
import {
  isInsecureDesktopApp,
  isSameNarrow,
  parseNarrow,
  streamNarrow,
  subdomainFromHost,
} from './utils/request';
import {
  badRequest,
  internalError,
  isErrorResponse,
  methodNotAllowed,
  notFound,
  success,
  unauthorized,
} from './utils/response-helpers';

const WEB_CLIENT = 'website';

// Clients are reused across invocations of a warm Lambda
let lambdaClient: LambdaClient | null = null;
let localeCatalog: LocaleCatalog | null = null;
let localeCatalogDir: string | null = null;

function getLambdaClient(): LambdaClient {
  if (!lambdaClient) {
    lambdaClient = new LambdaClient({});
  }
  return lambdaClient;
}

function getLocaleCatalog(localeDir: string): LocaleCatalog {
  if (!localeCatalog || localeCatalogDir !== localeDir) {
    localeCatalog = new LocaleCatalog(localeDir);
    localeCatalogDir = localeDir;
  }
  return localeCatalog;
}

/**
 * Reset cached clients (for testing)
 */
export function resetHandlerState(): void {
  lambdaClient = null;
  localeCatalog = null;
  localeCatalogDir = null;
}

function createDeps(): PageParamsDeps {
  const settings = loadServerSettings();
  return {
    settings,
    store: createDynamoDataStore(),
    eventQueue: new LambdaEventQueue(getLambdaClient()),
    i18n: getLocaleCatalog(settings.localeDir),
    twoFactor: createDynamoTwoFactor(),
  };
}

async function resolveRealm(event: APIGatewayProxyEvent): Promise<Realm> {
  const host = event.headers.Host || event.headers.host || '';
  const subdomain = subdomainFromHost(host, process.env.ROOT_DOMAIN || 'localhost');
  const realm = subdomain === null ? null : await getRealmBySubdomain(subdomain);
  if (!realm) {
    throw new RealmNotFoundError(host);
  }
  return realm;
}

/**
 * Logged-in user from the authorizer context; no context means a spectator
 */
async function resolveUser(
  event: APIGatewayProxyEvent,
  realm: Realm
): Promise<{ user: UserProfile | null } | APIGatewayProxyResult> {
  const claimed: unknown = event.requestContext.authorizer?.userId;
  if (claimed === undefined || claimed === null || claimed === '') {
    return { user: null };
  }

  const userId = Number(claimed);
  if (!Number.isInteger(userId)) {
    return unauthorized('Invalid user identity');
  }

  const user = await getUserProfile(realm.realmId, userId);
  if (!user || !user.isActive) {
    return unauthorized('User not found or deactivated');
  }
  return { user };
}

async function resolveDisplayOptions(
  event: APIGatewayProxyEvent,
  realm: Realm,
  user: UserProfile | null
): Promise<HomeDisplayOptions> {
  const query = event.queryStringParameters ?? {};
  let narrow = parseNarrow(query.narrow);
  let narrowTopic: string | null = null;

  // A stream view's narrow is derived from the stream and topic
  const streamName = query.stream;
  const narrowStream = streamName ? await getStreamByName(realm.realmId, streamName) : null;
  if (streamName && !narrowStream) {
    console.log(`[HomeApi] Unknown stream "${streamName}", ignoring narrow`);
    narrow = [];
  } else if (narrowStream) {
    narrowTopic = query.topic || null;
    const derived = streamNarrow(narrowStream.name, narrowTopic);
    if (narrow.length > 0 && !isSameNarrow(narrow, derived)) {
      throw new InvalidNarrowError('narrow does not match the requested stream and topic');
    }
    narrow = derived;
  }

  return {
    insecureDesktopApp: isInsecureDesktopApp(event.headers['User-Agent'] || event.headers['user-agent']),
    narrow,
    narrowStream,
    narrowTopic,
    firstInRealm: false,
    promptForInvites: false,
    needsTutorial: user?.tutorialStatus === 'waiting',
  };
}

/**
 * Main handler
 */
export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  console.log(`[HomeApi] ${event.httpMethod} ${event.path}`);

  if (event.httpMethod !== 'GET') {
    return methodNotAllowed(event.httpMethod);
  }

  try {
    const realm = await resolveRealm(event);

    const resolved = await resolveUser(event, realm);
    if (isErrorResponse(resolved)) {
      return resolved;
    }
    const { user } = resolved;

    const display = await resolveDisplayOptions(event, realm, user);
    const request: RequestNotes = {
      client: user ? WEB_CLIENT : null,
      path: event.queryStringParameters?.path || '/',
      language: null,
    };

    const { queueId, pageParams } = await buildPageParamsForHomePageLoad(
      request,
      user,
      realm,
      display,
      createDeps()
    );

    return success(
      { queue_id: queueId, page_params: pageParams.toJSON() },
      { 'Content-Language': request.language ?? 'en' }
    );
  } catch (err) {
    if (err instanceof RealmNotFoundError) {
      return notFound(err.message);
    }
    if (err instanceof InvalidNarrowError) {
      return badRequest(err.message);
    }
    console.error('[HomeApi] Failed to build page params:', err);
    return internalError('Failed to load home view');
  }
}
