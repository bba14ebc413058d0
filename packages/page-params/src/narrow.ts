/**
 * Narrowed home view
 *
 * When the view is opened narrowed to a stream, the initial pointer is
 * the latest message of that stream and desktop notifications are off.
 */

import { InvariantViolationError } from './errors';
import { isRecord, type Snapshot } from './snapshot';
import type { HomeDataStore, NarrowTarget, NarrowTerm, NarrowTermRecord } from './types';

export type MessageLookup = Pick<HomeDataStore, 'getMaxMessageId'>;

/** max_message_id of a stream with no messages */
export const EMPTY_STREAM_MAX_MESSAGE_ID = -1;

export function encodeNarrow(narrow: readonly NarrowTerm[]): NarrowTermRecord[] {
  return narrow.map(([operator, operand]) => ({ operator, operand }));
}

/**
 * Must run after the event queue state has been merged into the snapshot
 */
export async function applyNarrowOverride(
  snapshot: Snapshot,
  target: NarrowTarget | null,
  narrow: readonly NarrowTerm[],
  messages: MessageLookup
): Promise<void> {
  if (target === null) {
    return;
  }

  const maxMessageId =
    (await messages.getMaxMessageId(target.stream.recipientId)) ?? EMPTY_STREAM_MAX_MESSAGE_ID;

  const userSettings = snapshot.get('user_settings');
  if (!isRecord(userSettings)) {
    throw new InvariantViolationError('page params have no user_settings object to override');
  }

  snapshot.set('narrow_stream', target.stream.name);
  if (target.topic !== null) {
    snapshot.set('narrow_topic', target.topic);
  }
  snapshot.set('narrow', encodeNarrow(narrow));
  snapshot.set('max_message_id', maxMessageId);
  snapshot.set('user_settings', { ...userSettings, enable_desktop_notifications: false });
}
