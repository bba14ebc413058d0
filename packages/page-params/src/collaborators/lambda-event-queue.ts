/**
 * Event queue client
 *
 * The event queue lives in its own Lambda function. Registration and
 * state fetches are invoked synchronously; the function answers in
 * API Gateway proxy format with `{ success, data }` or `{ success, error }`.
 */

import { InvokeCommand, type LambdaClient } from '@aws-sdk/client-lambda';
import type { Realm, UserProfile } from '@homeview/realm-core';
import { EventQueueError } from '../errors';
import { isRecord } from '../snapshot';
import type {
  EventQueue,
  FetchInitialStateOptions,
  InitialState,
  RegisterOptions,
} from '../types';

/**
 * Environment variable name for the events Lambda function
 */
const ENV_FUNCTION_NAME = 'EVENTS_FUNCTION';

export interface LambdaEventQueueOptions {
  /**
   * The Lambda function name or ARN
   * - Defaults to environment variable `EVENTS_FUNCTION`
   */
  functionName?: string;
}

// Missing ids sort as 0
function toNumber(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Reshape raw fetched state the way the client expects it, in place
 *
 * - `raw_users` becomes `realm_users` / `realm_non_active_users`, sorted by user_id
 * - `raw_recent_private_conversations` becomes a list, newest first
 * - state that is not backed by a queue has a null `queue_id`
 */
export function postProcessState(state: InitialState, queueBacked: boolean): void {
  const rawUsers = state.raw_users;
  if (isRecord(rawUsers)) {
    const users = Object.values(rawUsers)
      .filter(isRecord)
      .sort((a, b) => toNumber(a.user_id) - toNumber(b.user_id));
    const strip = ({ is_active, ...user }: Record<string, unknown>) => user;
    state.realm_users = users.filter((u) => u.is_active === true).map(strip);
    state.realm_non_active_users = users.filter((u) => u.is_active !== true).map(strip);
    delete state.raw_users;
  }

  const rawConversations = state.raw_recent_private_conversations;
  if (isRecord(rawConversations)) {
    state.recent_private_conversations = Object.values(rawConversations)
      .filter(isRecord)
      .map((conversation) => ({ ...conversation }))
      .sort((a, b) => toNumber(b.max_message_id) - toNumber(a.max_message_id));
    delete state.raw_recent_private_conversations;
  }

  if (!queueBacked) {
    state.queue_id = null;
  }
}

export class LambdaEventQueue implements EventQueue {
  private readonly functionName: string | undefined;

  /**
   * @param client - LambdaClient owned by the caller
   */
  constructor(
    private readonly client: Pick<LambdaClient, 'send'>,
    options: LambdaEventQueueOptions = {}
  ) {
    this.functionName = options.functionName ?? process.env[ENV_FUNCTION_NAME];
  }

  register(user: UserProfile, client: string, options: RegisterOptions): Promise<InitialState> {
    return this.invoke({
      action: 'register',
      realm_id: user.realmId,
      user_id: user.userId,
      client,
      apply_markdown: options.applyMarkdown,
      client_gravatar: options.clientGravatar,
      slim_presence: options.slimPresence,
      client_capabilities: options.clientCapabilities,
      narrow: options.narrow,
      include_streams: options.includeStreams,
    });
  }

  fetchInitialState(
    user: UserProfile | null,
    realm: Realm,
    options: FetchInitialStateOptions
  ): Promise<InitialState> {
    return this.invoke({
      action: 'fetch_initial_state',
      realm_id: realm.realmId,
      user_id: user?.userId ?? null,
      event_types: options.eventTypes,
      queue_id: options.queueId,
      client_gravatar: options.clientGravatar,
      user_avatar_url_field_optional: options.userAvatarUrlFieldOptional,
      user_settings_object: options.userSettingsObject,
      slim_presence: options.slimPresence,
      include_subscribers: options.includeSubscribers,
      include_streams: options.includeStreams,
    });
  }

  postProcess(_user: UserProfile | null, state: InitialState, queueBacked: boolean): void {
    postProcessState(state, queueBacked);
  }

  private async invoke(request: Record<string, unknown>): Promise<InitialState> {
    if (!this.functionName) {
      throw new EventQueueError(
        `Function name not provided. Set ${ENV_FUNCTION_NAME} environment variable or pass functionName option.`,
        'MISSING_FUNCTION'
      );
    }

    const response = await this.client.send(
      new InvokeCommand({
        FunctionName: this.functionName,
        Payload: new TextEncoder().encode(JSON.stringify({ body: JSON.stringify(request) })),
      })
    );

    if (response.FunctionError) {
      console.error(`[EventQueue] ${request.action} failed in ${this.functionName}: ${response.FunctionError}`);
      throw new EventQueueError(`Lambda execution error: ${response.FunctionError}`, 'FUNCTION_ERROR');
    }

    if (!response.Payload) {
      throw new EventQueueError('No payload returned from Lambda', 'EMPTY_PAYLOAD');
    }

    const proxyResult: unknown = JSON.parse(new TextDecoder().decode(response.Payload));
    if (!isRecord(proxyResult)) {
      throw new EventQueueError('Lambda returned a malformed response', 'INVALID_RESPONSE');
    }

    const body: unknown =
      typeof proxyResult.body === 'string' && proxyResult.body !== '' ? JSON.parse(proxyResult.body) : {};

    if (proxyResult.statusCode !== 200) {
      const message =
        isRecord(body) && typeof body.error === 'string'
          ? body.error
          : `Lambda returned status ${String(proxyResult.statusCode)}`;
      console.error(`[EventQueue] ${request.action} rejected: ${message}`);
      throw new EventQueueError(message, 'BAD_STATUS');
    }

    if (!isRecord(body) || !isRecord(body.data)) {
      throw new EventQueueError('Lambda response has no state', 'INVALID_RESPONSE');
    }

    return body.data;
  }
}
